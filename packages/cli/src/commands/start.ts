/**
 * @srvdeck/cli — Start Command
 *
 * Launches the interactive console in the foreground.
 *
 * Usage: srvdeck start [--dry-run]
 */

import pc from 'picocolors';
import { ConfigStore, errorMessage } from '@srvdeck/shared';
import { hasFlag } from '../lib/args.js';

export async function startCommand(args: readonly string[] = []): Promise<void> {
    if (!process.stdin.isTTY) {
        console.error(pc.red('\n❌ The console needs an interactive terminal.'));
        console.log(pc.dim('   Use "srvdeck install <service>" for unattended installs.\n'));
        process.exit(1);
    }

    try {
        ConfigStore.read();
    } catch (err) {
        console.error(pc.red(`\n❌ ${errorMessage(err)}`));
        console.log(pc.dim('   Fix the file or run "srvdeck config" to reset it.\n'));
        process.exit(1);
    }

    if (!ConfigStore.exists()) {
        console.log(pc.dim('  ⚙️  No configuration found, using defaults. Run "srvdeck config" to change them.'));
    }

    const { launchConsole } = await import('@srvdeck/tui');
    await launchConsole({ dryRun: hasFlag(args, '--dry-run') });
}
