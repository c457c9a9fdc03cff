/**
 * @srvdeck/cli — Command Router
 *
 * Parses CLI arguments and routes to the appropriate command handler.
 * Entry point for the `srvdeck` command.
 *
 * Usage:
 *   srvdeck start    — Open the interactive console (default)
 *   srvdeck install  — Install one service unattended
 *   srvdeck logs     — Show the command log
 *   srvdeck config   — Edit settings
 *   srvdeck help     — Show available commands
 */

import pc from 'picocolors';
import { APP_NAME, APP_VERSION } from '@srvdeck/shared';

function showHelp(): void {
    console.log(`
${pc.bold(pc.red(`🖥️  ${APP_NAME}`))} ${pc.dim(`v${APP_VERSION}`)}
${pc.dim('Terminal console for installing and running server software')}

${pc.bold('Usage:')}
  ${pc.cyan('srvdeck')} ${pc.yellow('<command>')} ${pc.dim('[options]')}

${pc.bold('Commands:')}
  ${pc.yellow('start')}              Opens the interactive console ${pc.dim('(--dry-run to simulate commands)')}
  ${pc.yellow('install <service>')}  Installs one service without the console ${pc.dim('(--dry-run)')}
  ${pc.yellow('logs')}               Prints the command log ${pc.dim('(-n <lines>, --path, --clear)')}
  ${pc.yellow('config')}             Opens the configuration editor
  ${pc.yellow('help')}               Shows this message

${pc.bold('Getting Started:')}
  ${pc.dim('1.')} ${pc.cyan('srvdeck config')}          ${pc.dim('— Check the shell and OS settings')}
  ${pc.dim('2.')} ${pc.cyan('srvdeck start --dry-run')} ${pc.dim('— Explore the menus safely')}
  ${pc.dim('3.')} ${pc.cyan('srvdeck start')}           ${pc.dim('— Manage this server')}
  `);
}

export async function main(args: string[]): Promise<void> {
    const command = args[0];
    const rest = args.slice(1);

    switch (command) {
        case 'start':
        case undefined: {
            const { startCommand } = await import('./commands/start.js');
            await startCommand(rest);
            break;
        }

        case 'install': {
            const { installCommand } = await import('./commands/install.js');
            await installCommand(rest);
            break;
        }

        case 'logs': {
            const { logsCommand } = await import('./commands/logs.js');
            logsCommand(rest);
            break;
        }

        case 'config':
        case 'setup': {
            const { configCommand } = await import('./commands/config.js');
            await configCommand();
            break;
        }

        case 'help':
        case '--help':
        case '-h': {
            showHelp();
            break;
        }

        default: {
            console.log(pc.red(`\n❌ Unknown command: ${command}`));
            showHelp();
            process.exit(1);
        }
    }
}

// Auto-invoke when run directly
await main(process.argv.slice(2));
