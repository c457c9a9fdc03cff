/**
 * @srvdeck/core — Shared Context
 *
 * Process-wide state every view can read: install flags, the execution
 * queue, terminal size, the last command result and the system log.
 * Created once at startup and passed to each view explicitly. Mutated
 * only inside the controller's message step.
 */

import {
    DEFAULT_TERMINAL_HEIGHT,
    DEFAULT_TERMINAL_WIDTH,
    MAX_SYSTEM_LOG_ENTRIES,
    type AppConfig,
    type OsFamily,
} from '@srvdeck/shared';
import type { CommandLog } from '../logging/command-logger.js';
import type { MonitoringSource } from '../monitoring/metrics-client.js';
import type { CommandRunner, ExecutionResult } from './command-runner.js';
import { ExecutionQueue } from './execution-queue.js';

// ─── Types ────────────────────────────────────────────────────────

export type LogColor = 'white' | 'gray' | 'green' | 'yellow' | 'red' | 'cyan' | 'blue' | 'magenta';

export interface SystemLogEntry {
    readonly time: string;
    readonly text: string;
    readonly color: LogColor;
}

export interface SharedContextOptions {
    readonly config: AppConfig;
    readonly os: OsFamily;
    readonly commandLog: CommandLog;
    /** Used by views for read-only checks (install status, service lists, reports) */
    readonly runner: CommandRunner;
    readonly monitor: MonitoringSource;
    /** Clock for system-log timestamps */
    readonly now?: () => Date;
}

/** Lines reserved for title, status and help text */
const RESERVED_LINES = 8;
const MIN_VIEWABLE_LINES = 5;
const RESERVED_COLUMNS = 4;
const MIN_CONTENT_WIDTH = 40;

// ─── Context ──────────────────────────────────────────────────────

export class SharedContext {
    /** Service key → installed */
    serviceStatus: Readonly<Record<string, boolean>> = {};
    readonly queue = new ExecutionQueue();
    /** Description of the command currently running, '' when idle */
    processingMessage = '';
    lastResult: ExecutionResult | undefined = undefined;
    spinnerFrame = 0;
    config: AppConfig;

    readonly os: OsFamily;
    readonly commandLog: CommandLog;
    readonly runner: CommandRunner;
    readonly monitor: MonitoringSource;

    private width = DEFAULT_TERMINAL_WIDTH;
    private height = DEFAULT_TERMINAL_HEIGHT;
    private readonly entries: SystemLogEntry[] = [];
    private readonly now: () => Date;

    constructor(options: SharedContextOptions) {
        this.config = options.config;
        this.os = options.os;
        this.commandLog = options.commandLog;
        this.runner = options.runner;
        this.monitor = options.monitor;
        this.now = options.now ?? (() => new Date());
    }

    get terminalWidth(): number {
        return this.width;
    }

    get terminalHeight(): number {
        return this.height;
    }

    setTerminalSize(width: number, height: number): void {
        this.width = width;
        this.height = height;
    }

    /** Rows available to scrolling content */
    viewableLines(): number {
        return this.height <= RESERVED_LINES ? MIN_VIEWABLE_LINES : this.height - RESERVED_LINES;
    }

    contentWidth(): number {
        return this.width <= RESERVED_COLUMNS ? MIN_CONTENT_WIDTH : this.width - RESERVED_COLUMNS;
    }

    // ─── System Log ───────────────────────────────────────────────

    get systemLog(): readonly SystemLogEntry[] {
        return this.entries;
    }

    log(text: string, color: LogColor = 'white'): void {
        const time = this.now().toLocaleTimeString('en-US');
        this.entries.push({ time, text, color });
        if (this.entries.length > MAX_SYSTEM_LOG_ENTRIES) {
            this.entries.splice(0, this.entries.length - MAX_SYSTEM_LOG_ENTRIES);
        }
    }
}
