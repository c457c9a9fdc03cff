/**
 * @srvdeck/core — Root Controller
 *
 * Owns the view registry, the navigator and the shared context, and is
 * the only place state changes. Dispatch order per message:
 *
 *   1. ctrl+c / quit short-circuit everything
 *   2. navigation is handled before any view sees it
 *   3. command completions advance the execution queue
 *   4. queue requests, queue start, spinner, resize, status loads
 *   5. targeted messages go to their view, the rest to the active view
 */

import { errorMessage, SPINNER_INTERVAL_MS } from '@srvdeck/shared';
import type { CompletionBridge } from './completion-bridge.js';
import { Effects, type Effect } from './effects.js';
import { keyLabel, type CommandCompletedMessage, type EffectFailedMessage, type Message } from './messages.js';
import { Navigator, type NavigationState } from './navigation.js';
import { beginQueue, settleQueue, type QueueStep } from './queue-driver.js';
import type { SharedContext } from './shared-context.js';
import type { ExecutionResult } from './command-runner.js';
import type { ViewRegistry } from './view.js';

export interface RootControllerOptions<R> {
    readonly context: SharedContext;
    readonly views: ViewRegistry<R>;
    readonly bridge: CompletionBridge;
    readonly initial?: NavigationState;
}

/** Ticks carry the run they animate; a tick left over from an earlier run stops its chain. */
function spinnerTick(runId: string): Effect {
    return Effects.tick(SPINNER_INTERVAL_MS, { type: 'spinner-tick', runId });
}

export class RootController<R> {
    readonly context: SharedContext;
    readonly navigator: Navigator<R>;
    private readonly views: ViewRegistry<R>;
    private readonly bridge: CompletionBridge;

    constructor(options: RootControllerOptions<R>) {
        this.context = options.context;
        this.views = options.views;
        this.bridge = options.bridge;
        this.navigator = new Navigator(options.views, options.initial);
    }

    get current(): NavigationState {
        return this.navigator.current;
    }

    init(): Effect {
        return this.views[this.navigator.current].init();
    }

    render(): R {
        return this.views[this.navigator.current].render();
    }

    update(message: Message): Effect {
        switch (message.type) {
            case 'key':
                if (keyLabel(message.key) === 'ctrl+c') return Effects.quit();
                return this.activeView(message);

            case 'quit':
                return Effects.quit();

            case 'navigate':
                return this.navigator.navigateTo(message.state, message.payload);

            case 'navigate-back':
                return this.navigator.navigateBack();

            case 'command-completed':
                return this.handleCompletion(message);

            case 'queue-requested':
                this.context.queue.load(message.label, message.commands);
                return this.navigator.navigateTo('processing', {
                    kind: 'processing',
                    action: { kind: 'run-queue' },
                });

            case 'queue-start':
                return this.startQueue();

            case 'spinner-tick': {
                const queue = this.context.queue;
                if (message.runId !== queue.runId || !queue.isActive) return Effects.none();
                this.context.spinnerFrame += 1;
                return spinnerTick(queue.runId);
            }

            case 'resize':
                this.context.setTerminalSize(message.width, message.height);
                return this.activeView(message);

            case 'service-status-loaded':
                this.context.serviceStatus = { ...message.status };
                return Effects.none();

            case 'effect-failed':
                return this.handleEffectFailure(message);

            default:
                return this.views[message.target].update(message);
        }
    }

    // ─── Queue ────────────────────────────────────────────────────

    private startQueue(): Effect {
        const queue = this.context.queue;
        if (queue.isActive) return Effects.none();

        const step = beginQueue(queue);
        if (step.kind !== 'dispatch') return Effects.none();

        this.context.log(`▶ ${queue.label}: ${queue.commands.length} step(s)`, 'cyan');
        return Effects.batch(this.applyStep(step, queue.label), spinnerTick(queue.runId));
    }

    private handleCompletion(message: CommandCompletedMessage): Effect {
        this.record(message.result);

        const queue = this.context.queue;
        if (message.runId !== queue.runId || !queue.isActive) {
            this.context.log(`Ignored result from a discarded queue: ${message.description}`, 'gray');
            return Effects.none();
        }

        this.context.lastResult = message.result;
        return this.applyStep(settleQueue(queue, message.result), message.queueLabel);
    }

    private applyStep(step: QueueStep, label: string): Effect {
        const queue = this.context.queue;
        switch (step.kind) {
            case 'dispatch':
                this.context.processingMessage = step.command.description;
                return this.bridge.dispatch(step.command, queue.label, queue.runId);

            case 'finished':
                this.context.processingMessage = '';
                this.context.log(`✅ ${label} completed`, 'green');
                return this.showProcessing();

            case 'failed':
                this.context.processingMessage = '';
                this.context.log(`❌ ${label} failed: ${step.message}`, 'red');
                return this.showProcessing();
        }
    }

    /** Write to the command log. A failed write is reported, never fatal. */
    private record(result: ExecutionResult): void {
        try {
            this.context.commandLog.logCommand(result);
        } catch (err) {
            this.context.log(`Command log unavailable: ${errorMessage(err)}`, 'yellow');
        }
    }

    private showProcessing(): Effect {
        if (this.navigator.current === 'processing') return Effects.clearScreen();
        return this.navigator.navigateTo('processing');
    }

    // ─── Delegation ───────────────────────────────────────────────

    private handleEffectFailure(message: EffectFailedMessage): Effect {
        this.context.log(`${message.label} failed: ${message.error}`, 'red');
        if (message.target === undefined) return Effects.none();
        return this.views[message.target].update(message);
    }

    private activeView(message: Message): Effect {
        return this.views[this.navigator.current].update(message);
    }
}
