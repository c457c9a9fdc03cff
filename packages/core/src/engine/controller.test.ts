import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigStore, SPINNER_INTERVAL_MS } from '@srvdeck/shared';
import { RootController } from './controller.js';
import { Program } from './program.js';
import { SharedContext } from './shared-context.js';
import { CompletionBridge } from './completion-bridge.js';
import { ScriptedRunner, type RunnerScript } from './scripted-runner.js';
import { commandsFrom, type Command } from './execution-queue.js';
import { Effects } from './effects.js';
import { keyMessage, type Message } from './messages.js';
import { SUCCESS_LINE } from './queue-driver.js';
import { recordingViews } from './recording-views.js';
import type { CommandRunner, ExecutionResult } from './command-runner.js';
import { MemoryCommandLog, type CommandLog } from '../logging/command-logger.js';
import type { MonitoringSource } from '../monitoring/metrics-client.js';
import { CommandLogError } from '../errors.js';

const unusedMonitor: MonitoringSource = {
    snapshot: () => Promise.reject(new Error('monitoring not used here')),
};

/** Runner whose commands finish only when the test says so. */
class DeferredRunner implements CommandRunner {
    readonly pending: Array<{ invocation: string; finish: (exitCode: number) => void }> = [];

    run(invocation: string): Promise<ExecutionResult> {
        return new Promise((resolve) => {
            this.pending.push({
                invocation,
                finish: (exitCode) => {
                    const at = new Date();
                    resolve({
                        command: invocation,
                        combinedOutput: '',
                        ...(exitCode !== 0 ? { error: { message: `exit status ${exitCode}` } } : {}),
                        exitCode,
                        startTime: at,
                        endTime: at,
                        durationMs: 0,
                    });
                },
            });
        });
    }
}

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const programs: Array<Program<string>> = [];

afterEach(() => {
    for (const program of programs.splice(0)) program.stop();
});

function setup(options: { runner?: CommandRunner; script?: RunnerScript; commandLog?: CommandLog } = {}) {
    const runner = options.runner ?? new ScriptedRunner(options.script);
    const commandLog = options.commandLog ?? new MemoryCommandLog();
    const context = new SharedContext({
        config: ConfigStore.defaults(),
        os: 'ubuntu',
        commandLog,
        runner,
        monitor: unusedMonitor,
    });
    const views = recordingViews();
    // The processing screen starts the queue when it becomes active.
    views.processing.onInit = () => Effects.message({ type: 'queue-start' });

    const controller = new RootController({ context, views, bridge: new CompletionBridge(runner) });
    const surface = { clear: vi.fn(), quit: vi.fn() };
    const onQuit = vi.fn();
    const program = new Program(controller, { onQuit });
    program.attach(surface);
    program.start();
    programs.push(program);

    return { context, views, controller, program, surface, onQuit, commandLog };
}

function requestQueue(label: string, commands: readonly Command[]): Message {
    return { type: 'queue-requested', label, commands };
}

describe('RootController queue handling', () => {
    it('runs every command of an all-success list once', async () => {
        const runner = new ScriptedRunner();
        const { context, program } = setup({ runner });

        program.post(requestQueue('demo', commandsFrom(['a', 'b', 'c'], ['A', 'B', 'C'])));
        await program.idle();

        expect(runner.invocations).toEqual(['a', 'b', 'c']);
        expect(context.queue.hasNext()).toBe(false);
        expect(context.queue.isActive).toBe(false);
        expect(context.queue.resultsLog).toEqual([SUCCESS_LINE, SUCCESS_LINE, SUCCESS_LINE]);
        expect(context.processingMessage).toBe('');
        expect(context.systemLog.map((entry) => entry.text)).toEqual(['▶ demo: 3 step(s)', '✅ demo completed']);
    });

    it('halts on failure: one success line, then the failure line', async () => {
        const runner = new ScriptedRunner((inv) => (inv === 'false' ? { exitCode: 1 } : undefined));
        const { context, controller, program, commandLog } = setup({ runner });

        program.post(requestQueue('demo', commandsFrom(['true', 'false'], ['ok', 'fail'])));
        await program.idle();

        expect(runner.invocations).toEqual(['true', 'false']);
        expect(context.queue.resultsLog).toEqual(['✅ Command completed successfully', '❌ Failed: exit status 1']);
        expect(context.queue.hasNext()).toBe(false);
        expect(context.queue.commands).toEqual([]);
        expect(context.queue.isActive).toBe(false);
        expect(context.lastResult?.exitCode).toBe(1);
        expect(controller.current).toBe('processing');
        expect(controller.navigator.history).toEqual(['menu']);
        expect(context.systemLog[context.systemLog.length - 1]).toMatchObject({
            text: '❌ demo failed: exit status 1',
            color: 'red',
        });
        expect(commandLog.readLogLines().filter((line) => line.startsWith('COMMAND: '))).toEqual([
            'COMMAND: true',
            'COMMAND: false',
        ]);
    });

    it('stops after the k-th command fails', async () => {
        const runner = new ScriptedRunner((inv) => (inv === 'c2' ? { exitCode: 4 } : undefined));
        const { context, program } = setup({ runner });

        program.post(requestQueue('k', commandsFrom(['c1', 'c2', 'c3', 'c4'], ['1', '2', '3', '4'])));
        await program.idle();

        expect(runner.invocations).toEqual(['c1', 'c2']);
        expect(context.queue.resultsLog[context.queue.resultsLog.length - 1]).toBe('❌ Failed: exit status 4');
    });

    it('dispatches nothing for an empty list', async () => {
        const runner = new ScriptedRunner();
        const { context, controller, program } = setup({ runner });

        program.post(requestQueue('nothing', []));
        await program.idle();

        expect(runner.invocations).toEqual([]);
        expect(program.pendingTasks).toBe(0);
        expect(context.queue.hasNext()).toBe(false);
        expect(context.queue.isActive).toBe(false);
        expect(controller.current).toBe('processing');
    });

    it('sets the processing message to the running command', async () => {
        const runner = new DeferredRunner();
        const { context, program } = setup({ runner });

        program.post(requestQueue('demo', commandsFrom(['sleep 1'], ['Waiting a bit'])));
        expect(context.processingMessage).toBe('Waiting a bit');
        expect(context.queue.isActive).toBe(true);

        runner.pending[0]?.finish(0);
        await program.idle();
        expect(context.processingMessage).toBe('');
    });

    it('navigates back to processing when a queue finishes elsewhere', async () => {
        const { controller, views, program } = setup();

        program.post(requestQueue('demo', commandsFrom(['true'], ['ok'])));
        program.post({ type: 'navigate-back' });
        expect(controller.current).toBe('menu');

        await program.idle();

        expect(controller.current).toBe('processing');
        expect(controller.navigator.history).toEqual(['menu']);
        expect(views.processing.payloads).toEqual([
            { kind: 'processing', action: { kind: 'run-queue' } },
            undefined,
        ]);
    });

    it('only clears the screen when processing is already showing', async () => {
        const { controller, program, surface } = setup();

        program.post(requestQueue('demo', commandsFrom(['true'], ['ok'])));
        const clearsAfterNavigation = surface.clear.mock.calls.length;
        await program.idle();

        expect(controller.navigator.history).toEqual(['menu']);
        expect(surface.clear.mock.calls.length).toBe(clearsAfterNavigation + 1);
    });

    it('ignores a completion from a discarded queue', async () => {
        const runner = new DeferredRunner();
        const { context, program } = setup({ runner });

        program.post(requestQueue('first', commandsFrom(['old'], ['Old step'])));
        program.post(requestQueue('second', commandsFrom(['new'], ['New step'])));
        expect(runner.pending.map((p) => p.invocation)).toEqual(['old', 'new']);

        runner.pending[0]?.finish(0);
        await flush();

        expect(context.queue.label).toBe('second');
        expect(context.queue.resultsLog).toEqual([]);
        expect(context.queue.isActive).toBe(true);
        expect(context.systemLog[context.systemLog.length - 1]).toMatchObject({
            text: 'Ignored result from a discarded queue: Old step',
            color: 'gray',
        });

        runner.pending[1]?.finish(0);
        await program.idle();
        expect(context.queue.resultsLog).toEqual([SUCCESS_LINE]);
    });

    it('drops spinner ticks left over from an earlier queue', async () => {
        const runner = new DeferredRunner();
        const { context, controller, program } = setup({ runner });

        program.post(requestQueue('first', commandsFrom(['a'], ['A'])));
        const firstRun = context.queue.runId;
        runner.pending[0]?.finish(0);
        await flush();
        expect(context.queue.isActive).toBe(false);

        program.post(requestQueue('second', commandsFrom(['b'], ['B'])));
        const secondRun = context.queue.runId;
        const frame = context.spinnerFrame;

        expect(controller.update({ type: 'spinner-tick', runId: firstRun })).toEqual(Effects.none());
        expect(context.spinnerFrame).toBe(frame);

        expect(controller.update({ type: 'spinner-tick', runId: secondRun })).toEqual(
            Effects.tick(SPINNER_INTERVAL_MS, { type: 'spinner-tick', runId: secondRun }),
        );
        expect(context.spinnerFrame).toBe(frame + 1);

        runner.pending[1]?.finish(0);
        await program.idle();
    });

    it('keeps going when the command log cannot be written', async () => {
        const failingLog: CommandLog = {
            path: '/unwritable/commands.log',
            logCommand: () => {
                throw new CommandLogError('failed to write command log: EACCES', '/unwritable/commands.log');
            },
            readLogLines: () => [],
            clear: () => undefined,
        };
        const { context, program } = setup({ commandLog: failingLog });

        program.post(requestQueue('demo', commandsFrom(['a', 'b'], ['A', 'B'])));
        await program.idle();

        expect(context.queue.resultsLog).toEqual([SUCCESS_LINE, SUCCESS_LINE]);
        expect(context.systemLog.filter((entry) => entry.color === 'yellow').map((entry) => entry.text)).toEqual([
            'Command log unavailable: failed to write command log: EACCES',
            'Command log unavailable: failed to write command log: EACCES',
        ]);
    });
});

describe('RootController routing', () => {
    it('quits on ctrl+c and terminates through onQuit', () => {
        const { program, surface, onQuit } = setup();
        program.post(keyMessage('ctrl+c'));
        expect(program.isStopped).toBe(true);
        expect(onQuit).toHaveBeenCalledTimes(1);
        expect(surface.quit).toHaveBeenCalledTimes(1);
    });

    it('sends other keys to the active view', () => {
        const { program, views } = setup();
        program.post(keyMessage('x'));
        expect(views.menu.messages).toEqual([keyMessage('x')]);
    });

    it('delivers targeted messages to their view, not the active one', () => {
        const { program, views } = setup();
        const loaded: Message = { type: 'log-lines-loaded', target: 'log-viewer', lines: ['one'] };
        program.post(loaded);
        expect(views['log-viewer'].messages).toEqual([loaded]);
        expect(views.menu.messages).toEqual([]);
    });

    it('records the terminal size before forwarding resize', () => {
        const { program, context, views } = setup();
        program.post({ type: 'resize', width: 120, height: 40 });
        expect(context.terminalWidth).toBe(120);
        expect(context.viewableLines()).toBe(32);
        expect(views.menu.messages).toEqual([{ type: 'resize', width: 120, height: 40 }]);
    });

    it('replaces the install status', () => {
        const { program, context } = setup();
        program.post({ type: 'service-status-loaded', status: { php: true, git: false } });
        expect(context.serviceStatus).toEqual({ php: true, git: false });
    });

    it('turns a rejected task into effect-failed for its target', async () => {
        const { program, views, context } = setup();
        views.menu.onUpdate = () => Effects.task('load logs', () => Promise.reject(new Error('boom')), 'log-viewer');

        program.post(keyMessage('l'));
        await program.idle();

        expect(views['log-viewer'].messages).toEqual([
            { type: 'effect-failed', label: 'load logs', error: 'boom', target: 'log-viewer' },
        ]);
        expect(context.systemLog[context.systemLog.length - 1]).toMatchObject({
            text: 'load logs failed: boom',
            color: 'red',
        });
    });
});
