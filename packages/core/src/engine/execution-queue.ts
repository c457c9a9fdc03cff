/**
 * @srvdeck/core — Execution Queue
 *
 * Ordered, cursor-tracked list of pending shell commands plus the
 * human-readable results log shown on the Processing screen.
 *
 * The queue is owned by the SharedContext and mutated only inside the
 * controller's message step. Background workers never hold a reference
 * to it: they receive an immutable Command and report back by message.
 */

import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError } from '../errors.js';

// ─── Types ────────────────────────────────────────────────────────

export interface Command {
    /** Passed verbatim to `<shell> -c` */
    readonly invocation: string;
    /** Shown to the operator while the command runs */
    readonly description: string;
}

export type NextCommand =
    | { readonly ok: true; readonly command: Command }
    | { readonly ok: false };

/** Pair provider output into commands. Lengths must match. */
export function commandsFrom(
    invocations: readonly string[],
    descriptions: readonly string[],
): Command[] {
    if (invocations.length !== descriptions.length) {
        throw new ConfigurationError('commands and descriptions length mismatch');
    }
    return invocations.map((invocation, i) => ({ invocation, description: descriptions[i] ?? '' }));
}

// ─── Queue ────────────────────────────────────────────────────────

export class ExecutionQueue {
    private items: Command[] = [];
    private position = 0;
    private results: string[] = [];
    private queueLabel = '';
    private active = false;
    private currentRunId = '';

    get commands(): readonly Command[] {
        return this.items;
    }

    /** Index of the next command to hand out; `0 <= cursor <= commands.length` */
    get cursor(): number {
        return this.position;
    }

    get resultsLog(): readonly string[] {
        return this.results;
    }

    get label(): string {
        return this.queueLabel;
    }

    get isActive(): boolean {
        return this.active;
    }

    /** Identifies the current load; completions carrying another id are stale. */
    get runId(): string {
        return this.currentRunId;
    }

    addCommand(invocation: string, description: string): void {
        this.items.push(Object.freeze({ invocation, description }));
    }

    /**
     * Replace whatever was queued with a new labelled list.
     * Any unfinished queue is discarded.
     */
    load(label: string, commands: readonly Command[]): string {
        this.reset();
        this.queueLabel = label;
        this.currentRunId = uuidv4();
        for (const command of commands) {
            this.addCommand(command.invocation, command.description);
        }
        return this.currentRunId;
    }

    hasNext(): boolean {
        return this.position < this.items.length;
    }

    next(): NextCommand {
        const command = this.items[this.position];
        if (command === undefined) return { ok: false };
        this.position++;
        return { ok: true, command };
    }

    addResult(line: string): void {
        this.results.push(line);
    }

    setActive(active: boolean): void {
        this.active = active;
    }

    reset(): void {
        this.items = [];
        this.position = 0;
        this.results = [];
        this.queueLabel = '';
        this.active = false;
        this.currentRunId = '';
    }

    /**
     * Empty the queue after a failure. Lines already in the results log
     * stay visible and `line` becomes the last one.
     */
    abort(line: string): void {
        const produced = this.results;
        this.reset();
        this.results = [...produced, line];
    }
}
