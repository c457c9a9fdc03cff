/**
 * @srvdeck/core — Completion Bridge
 *
 * Wraps one CommandRunner invocation as a background task whose only
 * observable effect is a `command-completed` message. The task closes
 * over immutable strings and never touches the queue, the shared context
 * or a view: the controller applies the result when the message arrives.
 */

import type { CommandRunner } from './command-runner.js';
import { Effects, type Effect } from './effects.js';
import type { Command } from './execution-queue.js';
import type { CommandCompletedMessage } from './messages.js';

export class CompletionBridge {
    constructor(private readonly runner: CommandRunner) {}

    /** Run `command` and resolve with its completion message. */
    async complete(command: Command, queueLabel: string, runId: string): Promise<CommandCompletedMessage> {
        const { invocation, description } = command;
        const result = await this.runner.run(invocation);
        return { type: 'command-completed', result, queueLabel, runId, description };
    }

    dispatch(command: Command, queueLabel: string, runId: string): Effect {
        return Effects.task(`run: ${command.description}`, () => this.complete(command, queueLabel, runId));
    }
}
