import { describe, it, expect } from 'vitest';
import { runBatch } from './batch.js';
import { CompletionBridge } from './completion-bridge.js';
import { ShellCommandRunner } from './command-runner.js';
import { ScriptedRunner } from './scripted-runner.js';
import { commandsFrom } from './execution-queue.js';

describe('runBatch', () => {
    it('stops at the first failure and aggregates the steps that ran', async () => {
        const bridge = new CompletionBridge(new ShellCommandRunner('bash'));
        const commands = commandsFrom(['echo a', 'exit 1', 'echo b'], ['first', 'second', 'third']);

        const result = await runBatch(bridge, commands);

        expect(result.command).toBe('batch execution (3 commands)');
        expect(result.error).toEqual({ message: 'failed at step 2 (second): exit status 1' });
        expect(result.exitCode).toBe(1);
        expect(result.combinedOutput).toBe(
            '=== BATCH EXECUTION RESULTS ===\nStep 1 (first):\na\n\n---\nStep 2 (second):\n\n=== END RESULTS ===',
        );
        expect(result.combinedOutput).not.toContain('Step 3');
    });

    it('never runs commands after a failure', async () => {
        const runner = new ScriptedRunner((inv) => (inv === 'exit 1' ? { exitCode: 1 } : undefined));
        const commands = commandsFrom(['echo a', 'exit 1', 'echo b'], ['first', 'second', 'third']);

        await runBatch(new CompletionBridge(runner), commands);

        expect(runner.invocations).toEqual(['echo a', 'exit 1']);
    });

    it('reports success with summed durations', async () => {
        const start = new Date('2026-03-01T10:00:00Z');
        const runner = new ScriptedRunner((inv) => ({ output: `${inv}\n` }), () => start);
        const commands = commandsFrom(['one', 'two'], ['Step one', 'Step two']);

        const result = await runBatch(new CompletionBridge(runner), commands, 'install php');

        expect(result.error).toBeUndefined();
        expect(result.exitCode).toBe(0);
        expect(result.durationMs).toBe(0);
        expect(result.startTime).toEqual(start);
        expect(result.combinedOutput).toBe(
            '=== BATCH EXECUTION RESULTS ===\nStep 1 (Step one):\none\n\n---\nStep 2 (Step two):\ntwo\n\n=== END RESULTS ===',
        );
    });

    it('returns an empty aggregate for an empty list', async () => {
        const runner = new ScriptedRunner();
        const result = await runBatch(new CompletionBridge(runner), []);
        expect(result.command).toBe('batch execution (0 commands)');
        expect(result.exitCode).toBe(0);
        expect(result.combinedOutput).toBe('=== BATCH EXECUTION RESULTS ===\n\n=== END RESULTS ===');
        expect(runner.invocations).toEqual([]);
    });
});
