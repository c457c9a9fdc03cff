/**
 * @srvdeck/cli — Logs Command
 *
 * Usage:
 *   srvdeck logs            — last 50 lines of the command log
 *   srvdeck logs -n 200     — last 200 lines
 *   srvdeck logs --path     — where the log lives
 *   srvdeck logs --clear    — empty it
 */

import pc from 'picocolors';
import { CommandLogger } from '@srvdeck/core';
import { ConfigStore } from '@srvdeck/shared';
import { flagValue, hasFlag } from '../lib/args.js';

export const DEFAULT_TAIL_LINES = 50;

export function tailLines(lines: readonly string[], count: number): string[] {
    if (count <= 0) return [];
    return lines.slice(-count);
}

/** `-n` value as a positive line count; anything else falls back to the default. */
export function parseLineCount(value: string | undefined): number {
    if (value === undefined || !/^\d+$/.test(value)) return DEFAULT_TAIL_LINES;
    const count = Number(value);
    return count > 0 ? count : DEFAULT_TAIL_LINES;
}

function colorize(line: string): string {
    if (line.startsWith('STATUS: FAILED') || line.startsWith('ERROR:')) return pc.red(line);
    if (line.startsWith('STATUS: SUCCESS')) return pc.green(line);
    if (line.startsWith('COMMAND:')) return pc.yellow(line);
    if (line.startsWith('===')) return pc.dim(line);
    return line;
}

export function logsCommand(args: readonly string[]): void {
    const log = new CommandLogger(ConfigStore.logFilePath(ConfigStore.read()));

    if (hasFlag(args, '--path')) {
        console.log(log.path);
        return;
    }

    if (hasFlag(args, '--clear')) {
        log.clear();
        console.log(`  ⚡ [logs] Cleared ${log.path}`);
        return;
    }

    const lines = log.readLogLines();
    if (lines.length === 0) {
        console.log(pc.dim(`  No commands logged yet (${log.path}).`));
        return;
    }

    const count = parseLineCount(flagValue(args, '-n', '--lines'));
    console.log(pc.dim(`  📄 ${log.path} (${log.sizeBytes()} bytes)\n`));
    for (const line of tailLines(lines, count)) console.log(colorize(line));
}
