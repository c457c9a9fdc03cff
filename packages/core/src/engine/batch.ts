/**
 * @srvdeck/core — Batch Mode
 *
 * Runs a whole command list to completion without yielding to the
 * controller, then reports one aggregated result. It is the stepped
 * machinery driven in a loop: a private ExecutionQueue, the same
 * beginQueue/settleQueue policy and the same CompletionBridge tasks,
 * each awaited before the next is handed out.
 */

import type { CompletionBridge } from './completion-bridge.js';
import type { ExecutionResult } from './command-runner.js';
import { ExecutionQueue, type Command } from './execution-queue.js';
import { beginQueue, settleQueue } from './queue-driver.js';

interface StepRecord {
    readonly index: number;
    readonly description: string;
    readonly result: ExecutionResult;
}

function aggregate(commands: readonly Command[], steps: readonly StepRecord[], startTime: Date): ExecutionResult {
    const sections = steps.map((step) => `Step ${step.index} (${step.description}):\n${step.result.combinedOutput}`);
    const failed = steps.find((step) => step.result.error !== undefined);
    const failure = failed?.result.error;
    const last = steps[steps.length - 1];

    return {
        command: `batch execution (${commands.length} commands)`,
        combinedOutput: `=== BATCH EXECUTION RESULTS ===\n${sections.join('\n---\n')}\n=== END RESULTS ===`,
        ...(failed !== undefined && failure !== undefined
            ? { error: { message: `failed at step ${failed.index} (${failed.description}): ${failure.message}` } }
            : {}),
        exitCode: failed?.result.exitCode ?? 0,
        startTime: steps[0]?.result.startTime ?? startTime,
        endTime: last?.result.endTime ?? startTime,
        durationMs: steps.reduce((sum, step) => sum + step.result.durationMs, 0),
    };
}

/** Stops at the first failure; commands after it never run. */
export async function runBatch(
    bridge: CompletionBridge,
    commands: readonly Command[],
    label = 'batch',
): Promise<ExecutionResult> {
    const queue = new ExecutionQueue();
    const runId = queue.load(label, commands);
    const startTime = new Date();
    const steps: StepRecord[] = [];

    let step = beginQueue(queue);
    while (step.kind === 'dispatch') {
        const completed = await bridge.complete(step.command, label, runId);
        steps.push({ index: steps.length + 1, description: completed.description, result: completed.result });
        step = settleQueue(queue, completed.result);
    }

    return aggregate(commands, steps, startTime);
}
