/**
 * @srvdeck/tui — Entry Point
 *
 * Wires the engine to the host (shell runner, command log, metrics
 * client, detected OS) and renders the Console with Ink.
 */

import React from 'react';
import { render } from 'ink';
import {
    CompletionBridge,
    CommandLogger,
    dryRunScript,
    MemoryCommandLog,
    MetricsClient,
    Program,
    RootController,
    ScriptedRunner,
    SharedContext,
    ShellCommandRunner,
    type CommandLog,
    type CommandRunner,
} from '@srvdeck/core';
import { ConfigStore, resolveOsFamily } from '@srvdeck/shared';
import { Console } from './components/Console.js';
import { createViews } from './views/registry.js';

export interface LaunchOptions {
    /** Echo commands instead of running them; nothing is written to disk */
    readonly dryRun?: boolean;
}

interface Host {
    readonly runner: CommandRunner;
    readonly commandLog: CommandLog;
    terminate(): void;
}

function createHost(shell: string, logPath: string, dryRun: boolean): Host {
    if (dryRun) {
        return { runner: new ScriptedRunner(dryRunScript), commandLog: new MemoryCommandLog(), terminate: () => {} };
    }
    const runner = new ShellCommandRunner(shell);
    return { runner, commandLog: new CommandLogger(logPath), terminate: () => runner.terminateAll() };
}

/** Resolves when the operator quits. */
export async function launchConsole(options: LaunchOptions = {}): Promise<void> {
    const config = ConfigStore.read();
    const host = createHost(config.shell, ConfigStore.logFilePath(config), options.dryRun === true);

    const context = new SharedContext({
        config,
        os: resolveOsFamily(config),
        commandLog: host.commandLog,
        runner: host.runner,
        monitor: new MetricsClient({
            endpoint: config.monitoring.endpoint,
            timeoutMs: config.monitoring.timeoutMs,
        }),
    });
    if (options.dryRun === true) context.log('Dry run: commands are echoed, not executed', 'yellow');

    const controller = new RootController({
        context,
        views: createViews(context),
        bridge: new CompletionBridge(host.runner),
    });
    const program = new Program(controller, { onQuit: host.terminate });

    const instance = render(<Console program={program} controller={controller} />, { exitOnCtrlC: false });
    program.attach({
        clear: () => instance.clear(),
        quit: () => instance.unmount(),
    });
    program.start();

    await instance.waitUntilExit();
    program.stop();
}
