/**
 * @srvdeck/core — Command Logger
 *
 * Appends one block per executed command to the command log file.
 * The file lives next to the config (`<home>/logs/commands.log`) unless
 * the config points elsewhere.
 *
 * Security: directory is created with 0o700 (owner only), log file with
 * 0o600. Passwords and keys embedded in an invocation are masked before
 * they reach the file.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { errorMessage } from '@srvdeck/shared';
import type { ExecutionResult } from '../engine/command-runner.js';
import { CommandLogError } from '../errors.js';

// ─── Contract ─────────────────────────────────────────────────────

export interface CommandLog {
    readonly path: string;
    /** Throws CommandLogError when the entry cannot be written */
    logCommand(result: ExecutionResult): void;
    /** Missing file → [] */
    readLogLines(): string[];
    clear(): void;
}

export interface CommandLoggerOptions {
    /** Mirror a one-line summary of each entry to the console */
    readonly echo?: boolean;
}

// ─── Formatting ───────────────────────────────────────────────────

const MASK = '***';

// A single-quoted shell word, including the '\'' sequences shellQuote emits
const QUOTED = String.raw`'(?:[^']|'\\'')*'|"[^"]*"`;

const SECRET_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
    [new RegExp(String.raw`(\s-p)(${QUOTED})`, 'g'), `$1${MASK}`],
    [new RegExp(String.raw`(--password=)(${QUOTED}|\S+)`, 'g'), `$1${MASK}`],
    [new RegExp(String.raw`\b(AWS_SECRET_ACCESS_KEY|AWS_ACCESS_KEY_ID|MYSQL_PWD)=(${QUOTED}|\S+)`, 'g'), `$1=${MASK}`],
    [new RegExp(String.raw`\b(password=)(${QUOTED}|\S+)`, 'gi'), `$1${MASK}`],
    [/(IDENTIFIED (?:WITH \w+ )?BY )'[^']*'/gi, `$1'${MASK}'`],
];

export function redactSecrets(invocation: string): string {
    return SECRET_PATTERNS.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), invocation);
}

export function formatLogEntry(result: ExecutionResult, timestamp: Date = new Date()): string {
    const failed = result.error !== undefined;
    const lines = [
        '=== COMMAND EXECUTION LOG ===',
        `TIMESTAMP: ${timestamp.toISOString()}`,
        `COMMAND: ${redactSecrets(result.command)}`,
        `START_TIME: ${result.startTime.toISOString()}`,
        `END_TIME: ${result.endTime.toISOString()}`,
        `DURATION: ${result.durationMs}ms`,
        `EXIT_CODE: ${result.exitCode}`,
        `STATUS: ${failed ? 'FAILED' : 'SUCCESS'}`,
        'OUTPUT:',
        result.combinedOutput.replace(/\n$/, ''),
    ];
    if (result.error !== undefined) {
        lines.push(`ERROR: ${result.error.message}`);
    }
    lines.push('=== END LOG ENTRY ===');
    return lines.join('\n') + '\n\n';
}

// ─── File Logger ──────────────────────────────────────────────────

export class CommandLogger implements CommandLog {
    constructor(
        readonly path: string,
        private readonly options: CommandLoggerOptions = {},
    ) {}

    logCommand(result: ExecutionResult): void {
        try {
            const dir = dirname(this.path);
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true, mode: 0o700 });
            }
            appendFileSync(this.path, formatLogEntry(result), { encoding: 'utf-8', mode: 0o600 });
        } catch (err) {
            throw new CommandLogError(`failed to write command log: ${errorMessage(err)}`, this.path);
        }

        if (this.options.echo === true) {
            const status = result.error === undefined ? '✅' : '❌';
            console.log(`  ${status} [command-log] ${redactSecrets(result.command)} (${result.durationMs}ms)`);
        }
    }

    readLogLines(): string[] {
        if (!existsSync(this.path)) return [];
        try {
            const lines = readFileSync(this.path, 'utf-8').split('\n');
            if (lines[lines.length - 1] === '') lines.pop();
            return lines;
        } catch (err) {
            throw new CommandLogError(`failed to read command log: ${errorMessage(err)}`, this.path);
        }
    }

    clear(): void {
        if (!existsSync(this.path)) return;
        try {
            writeFileSync(this.path, '', { encoding: 'utf-8', mode: 0o600 });
        } catch (err) {
            throw new CommandLogError(`failed to clear command log: ${errorMessage(err)}`, this.path);
        }
    }

    /** Size of the log in bytes, 0 when it does not exist */
    sizeBytes(): number {
        return existsSync(this.path) ? statSync(this.path).size : 0;
    }
}

// ─── In-memory Log ────────────────────────────────────────────────

/** Keeps entries in memory. Used for dry runs, where nothing should touch disk. */
export class MemoryCommandLog implements CommandLog {
    readonly path = '(memory)';
    private lines: string[] = [];

    constructor(private readonly now: () => Date = () => new Date()) {}

    logCommand(result: ExecutionResult): void {
        const entry = formatLogEntry(result, this.now()).split('\n');
        entry.pop();
        this.lines.push(...entry);
    }

    readLogLines(): string[] {
        return [...this.lines];
    }

    clear(): void {
        this.lines = [];
    }
}
