/**
 * @srvdeck/core — Queue Driver
 *
 * The halt-at-first-failure policy, shared by stepped execution (the
 * controller, one command per message) and batch execution (runBatch,
 * awaiting each step in turn). Both only ever advance a queue through
 * these two functions.
 */

import type { Command, ExecutionQueue } from './execution-queue.js';
import type { ExecutionResult } from './command-runner.js';

export const SUCCESS_LINE = '✅ Command completed successfully';

export function failureLine(message: string): string {
    return `❌ Failed: ${message}`;
}

export type QueueStep =
    | { readonly kind: 'dispatch'; readonly command: Command }
    | { readonly kind: 'finished' }
    | { readonly kind: 'failed'; readonly message: string };

function dispatchNext(queue: ExecutionQueue): QueueStep {
    const next = queue.next();
    if (!next.ok) {
        queue.setActive(false);
        return { kind: 'finished' };
    }
    return { kind: 'dispatch', command: next.command };
}

/** Activate the queue and hand out its first command. An empty queue finishes at once. */
export function beginQueue(queue: ExecutionQueue): QueueStep {
    if (!queue.hasNext()) {
        queue.setActive(false);
        return { kind: 'finished' };
    }
    queue.setActive(true);
    return dispatchNext(queue);
}

/** Record one completed command and decide what happens next. */
export function settleQueue(queue: ExecutionQueue, result: ExecutionResult): QueueStep {
    if (result.error !== undefined) {
        queue.abort(failureLine(result.error.message));
        return { kind: 'failed', message: result.error.message };
    }

    queue.addResult(SUCCESS_LINE);
    return dispatchNext(queue);
}
