/**
 * @srvdeck/core — Scripted Runner
 *
 * A CommandRunner that never spawns anything. Each invocation is recorded
 * and answered from a script; unscripted invocations succeed with no
 * output. Backs `--dry-run` and the engine tests.
 */

import { LAUNCH_FAILURE_EXIT_CODE, type CommandRunner, type ExecutionResult } from './command-runner.js';

export interface ScriptedOutcome {
    readonly output?: string;
    readonly exitCode?: number;
    /** Defaults to `exit status <code>` for a non-zero exit */
    readonly error?: string;
}

export type RunnerScript = (invocation: string) => ScriptedOutcome | undefined;

/** Echo each invocation instead of running it. */
export const dryRunScript: RunnerScript = (invocation) => ({ output: `[dry-run] ${invocation}\n` });

export class ScriptedRunner implements CommandRunner {
    private readonly seen: string[] = [];

    constructor(
        private readonly script: RunnerScript = () => undefined,
        private readonly now: () => Date = () => new Date(),
    ) {}

    /** Every invocation run so far, in order */
    get invocations(): readonly string[] {
        return this.seen;
    }

    async run(invocation: string): Promise<ExecutionResult> {
        this.seen.push(invocation);
        const outcome = this.script(invocation) ?? {};
        const exitCode = outcome.exitCode ?? (outcome.error !== undefined ? LAUNCH_FAILURE_EXIT_CODE : 0);
        const at = this.now();
        return {
            command: invocation,
            combinedOutput: outcome.output ?? '',
            ...(exitCode !== 0 ? { error: { message: outcome.error ?? `exit status ${exitCode}` } } : {}),
            exitCode,
            startTime: at,
            endTime: at,
            durationMs: 0,
        };
    }
}
