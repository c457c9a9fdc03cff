/**
 * @srvdeck/cli — Install Command
 *
 * Installs one service without the console: the plan runs in batch mode,
 * the aggregated result is printed and appended to the command log.
 *
 * Usage: srvdeck install <service> [--dry-run]
 */

import pc from 'picocolors';
import {
    CommandLogger,
    CompletionBridge,
    dryRunScript,
    installableServices,
    MemoryCommandLog,
    planInstall,
    runBatch,
    ScriptedRunner,
    ShellCommandRunner,
    type CommandLog,
    type CommandPlan,
    type CommandRunner,
    type ExecutionResult,
} from '@srvdeck/core';
import { ConfigStore, errorMessage, resolveOsFamily, type AppConfig, type OsFamily } from '@srvdeck/shared';
import { hasFlag, positionals } from '../lib/args.js';

export interface InstallDeps {
    readonly os: OsFamily;
    readonly runner: CommandRunner;
    readonly commandLog: CommandLog;
}

export interface InstallOutcome {
    readonly plan: CommandPlan;
    readonly result: ExecutionResult;
    /** Set when the aggregated result could not be written */
    readonly logError?: string;
}

/** Plan, run and record one install. Planning errors propagate. */
export async function runInstall(service: string, deps: InstallDeps): Promise<InstallOutcome> {
    const plan = planInstall(service, deps.os);
    const result = await runBatch(new CompletionBridge(deps.runner), plan.commands, plan.label);
    try {
        deps.commandLog.logCommand(result);
        return { plan, result };
    } catch (err) {
        return { plan, result, logError: errorMessage(err) };
    }
}

/** Dry runs keep the log in memory; real runs append to the file and echo each entry. */
export function installDeps(config: AppConfig, dryRun: boolean): InstallDeps {
    const os = resolveOsFamily(config);
    return dryRun
        ? { os, runner: new ScriptedRunner(dryRunScript), commandLog: new MemoryCommandLog() }
        : {
              os,
              runner: new ShellCommandRunner(config.shell),
              commandLog: new CommandLogger(ConfigStore.logFilePath(config), { echo: true }),
          };
}

export async function installCommand(args: readonly string[]): Promise<void> {
    const [service] = positionals(args);
    if (service === undefined) {
        console.error(pc.red('\n❌ Missing service name.'));
        console.log(`   Usage: ${pc.cyan('srvdeck install')} ${pc.yellow('<service>')}`);
        console.log(pc.dim(`   Services: ${installableServices().join(', ')}\n`));
        process.exit(1);
    }

    const config = ConfigStore.read();
    const dryRun = hasFlag(args, '--dry-run');
    const deps = installDeps(config, dryRun);

    let outcome: InstallOutcome;
    try {
        const plan = planInstall(service, deps.os);
        console.log(`  ⚡ [install] ${plan.label} on ${deps.os}: ${plan.commands.length} step(s)${dryRun ? ' (dry run)' : ''}`);
        outcome = await runInstall(service, deps);
    } catch (err) {
        console.error(`  ❌ [install] ${errorMessage(err)}`);
        console.log(pc.dim(`   Services: ${installableServices().join(', ')}`));
        process.exit(1);
    }

    const { plan, result, logError } = outcome;
    console.log(result.combinedOutput);
    if (logError !== undefined) console.warn(`  ⚠️ [install] ${logError}`);

    if (result.error !== undefined) {
        console.error(`  ❌ [install] ${plan.label}: ${result.error.message}`);
        process.exit(1);
    }
    console.log(pc.green(`  ✅ [install] ${plan.label} installed in ${result.durationMs}ms`));
    if (!dryRun) console.log(pc.dim(`   Log: ${deps.commandLog.path}`));
}
