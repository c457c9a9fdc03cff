/**
 * @srvdeck/core — Command Runner
 *
 * Runs one external command through `<shell> -c`, with stdout and stderr
 * merged into a single stream in arrival order. The returned promise
 * always resolves: a failed or unlaunchable command is reported in the
 * ExecutionResult, never thrown.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { DEFAULT_SHELL, errorMessage } from '@srvdeck/shared';

// ─── Types ────────────────────────────────────────────────────────

export interface ExecutionError {
    readonly message: string;
}

export interface ExecutionResult {
    /** The invocation as it was run */
    readonly command: string;
    readonly combinedOutput: string;
    /** Present iff exitCode !== 0 */
    readonly error?: ExecutionError;
    /** -1 when the process could not start or was killed by a signal */
    readonly exitCode: number;
    readonly startTime: Date;
    readonly endTime: Date;
    readonly durationMs: number;
}

export interface CommandRunner {
    run(invocation: string): Promise<ExecutionResult>;
}

/** Exit code reported for launch failures and signal deaths */
export const LAUNCH_FAILURE_EXIT_CODE = -1;

// ─── Shell Runner ─────────────────────────────────────────────────

export class ShellCommandRunner implements CommandRunner {
    private readonly children = new Set<ChildProcess>();

    constructor(private readonly shell: string = DEFAULT_SHELL) {}

    /** Number of commands currently running */
    get inFlight(): number {
        return this.children.size;
    }

    run(invocation: string): Promise<ExecutionResult> {
        const startTime = new Date();

        return new Promise<ExecutionResult>((resolve) => {
            const chunks: string[] = [];
            let settled = false;

            const finish = (exitCode: number, message?: string): void => {
                if (settled) return;
                settled = true;
                const endTime = new Date();
                resolve({
                    command: invocation,
                    combinedOutput: chunks.join(''),
                    ...(message !== undefined ? { error: { message } } : {}),
                    exitCode,
                    startTime,
                    endTime,
                    durationMs: endTime.getTime() - startTime.getTime(),
                });
            };

            let child: ChildProcess;
            try {
                child = spawn(this.shell, ['-c', invocation], { stdio: ['ignore', 'pipe', 'pipe'] });
            } catch (err) {
                finish(LAUNCH_FAILURE_EXIT_CODE, errorMessage(err));
                return;
            }

            this.children.add(child);
            const collect = (chunk: string): void => {
                chunks.push(chunk);
            };
            child.stdout?.setEncoding('utf-8').on('data', collect);
            child.stderr?.setEncoding('utf-8').on('data', collect);

            child.on('error', (err) => {
                this.children.delete(child);
                finish(LAUNCH_FAILURE_EXIT_CODE, err.message);
            });

            child.on('close', (code, signal) => {
                this.children.delete(child);
                if (signal !== null) {
                    finish(LAUNCH_FAILURE_EXIT_CODE, `signal: ${signal}`);
                } else if (code === 0) {
                    finish(0);
                } else if (code === null) {
                    finish(LAUNCH_FAILURE_EXIT_CODE, 'exit status unknown');
                } else {
                    finish(code, `exit status ${code}`);
                }
            });
        });
    }

    /** SIGTERM every command still running. Used when the console quits. */
    terminateAll(): void {
        for (const child of this.children) {
            child.kill('SIGTERM');
        }
        this.children.clear();
    }
}
