/**
 * @srvdeck/core — Program
 *
 * The single-threaded runtime around a RootController. Messages are
 * posted into a FIFO mailbox and drained synchronously, one controller
 * update at a time. Effects returned by the controller are performed
 * here: background tasks run on the event loop and their results come
 * back through `post`, never by calling into the controller directly.
 */

import { errorMessage } from '@srvdeck/shared';
import type { RootController } from './controller.js';
import type { Effect } from './effects.js';
import type { Message } from './messages.js';

/** What the terminal host provides to the runtime. */
export interface ProgramSurface {
    clear(): void;
    quit(): void;
}

export interface ProgramOptions {
    /** Called once when the program stops (e.g. terminate running commands) */
    readonly onQuit?: () => void;
}

export class Program<R> {
    private readonly mailbox: Message[] = [];
    private readonly listeners = new Set<() => void>();
    private readonly timers = new Set<NodeJS.Timeout>();
    private idleWaiters: Array<() => void> = [];
    private surface: ProgramSurface | undefined = undefined;
    private draining = false;
    private stopped = false;
    private started = false;
    private inFlight = 0;

    constructor(
        private readonly controller: RootController<R>,
        private readonly options: ProgramOptions = {},
    ) {}

    get isStopped(): boolean {
        return this.stopped;
    }

    /** Number of background tasks that have not reported back yet */
    get pendingTasks(): number {
        return this.inFlight;
    }

    attach(surface: ProgramSurface): void {
        this.surface = surface;
    }

    start(): void {
        if (this.started) return;
        this.started = true;
        this.perform(this.controller.init());
        this.drain();
    }

    post(message: Message): void {
        if (this.stopped) return;
        this.mailbox.push(message);
        this.drain();
    }

    render(): R {
        return this.controller.render();
    }

    /** Register a re-render callback; returns the unsubscribe function. */
    subscribe(listener: () => void): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Resolves once the mailbox is empty and no background task is running. */
    idle(): Promise<void> {
        if (this.isIdle()) return Promise.resolve();
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    stop(): void {
        if (this.stopped) return;
        this.stopped = true;
        this.mailbox.length = 0;
        for (const timer of this.timers) clearTimeout(timer);
        this.timers.clear();
        this.options.onQuit?.();
        this.surface?.quit();
        this.releaseIdleWaiters();
    }

    // ─── Internals ────────────────────────────────────────────────

    private drain(): void {
        if (this.draining) return;
        this.draining = true;
        try {
            let message = this.mailbox.shift();
            while (message !== undefined && !this.stopped) {
                this.perform(this.controller.update(message));
                message = this.mailbox.shift();
            }
        } finally {
            this.draining = false;
        }
        this.notify();
        if (this.isIdle()) this.releaseIdleWaiters();
    }

    private perform(effect: Effect): void {
        if (this.stopped) return;
        switch (effect.kind) {
            case 'none':
                return;
            case 'message':
                this.mailbox.push(effect.message);
                return;
            case 'batch':
                for (const inner of effect.effects) this.perform(inner);
                return;
            case 'clear-screen':
                this.surface?.clear();
                return;
            case 'quit':
                this.stop();
                return;
            case 'tick': {
                const { message, ms } = effect;
                const timer = setTimeout(() => {
                    this.timers.delete(timer);
                    this.post(message);
                }, ms);
                timer.unref();
                this.timers.add(timer);
                return;
            }
            case 'task': {
                const { label, target } = effect;
                this.inFlight += 1;
                void effect.run().then(
                    (message) => this.settleTask(message),
                    (err: unknown) =>
                        this.settleTask({
                            type: 'effect-failed',
                            label,
                            error: errorMessage(err),
                            ...(target !== undefined ? { target } : {}),
                        }),
                );
                return;
            }
        }
    }

    private settleTask(message: Message | null): void {
        this.inFlight -= 1;
        if (message !== null) {
            this.post(message);
        }
        if (this.isIdle()) this.releaseIdleWaiters();
    }

    private isIdle(): boolean {
        return this.stopped || (this.inFlight === 0 && this.mailbox.length === 0 && !this.draining);
    }

    private releaseIdleWaiters(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }

    private notify(): void {
        for (const listener of this.listeners) listener();
    }
}
