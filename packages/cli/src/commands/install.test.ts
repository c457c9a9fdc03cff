import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    CommandLogError,
    CommandLogger,
    MemoryCommandLog,
    ScriptedRunner,
    ShellCommandRunner,
    type CommandLog,
    type ExecutionResult,
} from '@srvdeck/core';
import { ConfigStore } from '@srvdeck/shared';
import { installDeps, runInstall } from './install.js';

class FailingLog implements CommandLog {
    readonly path = '/nowhere/commands.log';

    logCommand(_result: ExecutionResult): void {
        throw new CommandLogError('failed to write command log: EACCES', this.path);
    }

    readLogLines(): string[] {
        return [];
    }

    clear(): void {}
}

describe('runInstall', () => {
    it('runs the plan for the OS and logs one aggregated entry', async () => {
        const runner = new ScriptedRunner();
        const commandLog = new MemoryCommandLog();

        const { plan, result } = await runInstall('git', { os: 'fedora', runner, commandLog });

        expect(plan.label).toBe('Git');
        expect(runner.invocations).toEqual(['sudo dnf install -y git']);
        expect(result.error).toBeUndefined();
        expect(result.combinedOutput).toBe(
            '=== BATCH EXECUTION RESULTS ===\nStep 1 (Installing Git...):\n\n=== END RESULTS ===',
        );
        expect(commandLog.readLogLines().filter((line) => line.startsWith('COMMAND:'))).toEqual([
            'COMMAND: batch execution (1 commands)',
        ]);
    });

    it('reports the failing step', async () => {
        const runner = new ScriptedRunner((invocation) => (invocation === 'sudo apt update' ? { exitCode: 100 } : undefined));

        const { result } = await runInstall('git', { os: 'ubuntu', runner, commandLog: new MemoryCommandLog() });

        expect(runner.invocations).toEqual(['sudo apt update']);
        expect(result.error?.message).toBe('failed at step 1 (Updating package lists...): exit status 100');
        expect(result.exitCode).toBe(100);
    });

    it('keeps the result when the log cannot be written', async () => {
        const outcome = await runInstall('git', { os: 'fedora', runner: new ScriptedRunner(), commandLog: new FailingLog() });

        expect(outcome.result.error).toBeUndefined();
        expect(outcome.logError).toBe('failed to write command log: EACCES');
    });

    it('rejects unknown services before running anything', async () => {
        const runner = new ScriptedRunner();

        await expect(runInstall('redis', { os: 'ubuntu', runner, commandLog: new MemoryCommandLog() })).rejects.toThrow(
            'Unknown service: redis',
        );
        expect(runner.invocations).toEqual([]);
    });
});

describe('installDeps', () => {
    let dir = '';

    afterEach(() => {
        vi.restoreAllMocks();
        if (dir !== '') rmSync(dir, { recursive: true, force: true });
        dir = '';
    });

    it('keeps dry runs in memory', () => {
        const deps = installDeps(ConfigStore.defaults(), true);

        expect(deps.commandLog).toBeInstanceOf(MemoryCommandLog);
        expect(deps.runner).toBeInstanceOf(ScriptedRunner);
    });

    it('writes real runs to the configured log and echoes each entry', async () => {
        dir = mkdtempSync(join(tmpdir(), 'srvdeck-install-'));
        const logFile = join(dir, 'commands.log');
        const deps = installDeps({ ...ConfigStore.defaults(), logFile }, false);
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        expect(deps.runner).toBeInstanceOf(ShellCommandRunner);
        expect(deps.commandLog).toBeInstanceOf(CommandLogger);
        expect(deps.commandLog.path).toBe(logFile);

        await runInstall('git', { ...deps, os: 'fedora', runner: new ScriptedRunner() });

        expect(log).toHaveBeenCalledWith(
            expect.stringMatching(/^ {2}✅ \[command-log\] batch execution \(1 commands\) \(\d+ms\)$/),
        );
        expect(readFileSync(logFile, 'utf-8')).toContain('COMMAND: batch execution (1 commands)\n');
    });
});
