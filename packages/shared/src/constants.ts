/**
 * @srvdeck/shared — Constants
 *
 * Central source of truth for names, defaults, and limits shared
 * across the engine, the TUI and the CLI.
 */

export const APP_NAME = 'srvdeck';
export const APP_VERSION = '0.1.0';

export const DEFAULT_SHELL = 'bash';

export const DEFAULT_TERMINAL_WIDTH = 80;
export const DEFAULT_TERMINAL_HEIGHT = 24;

export const DEFAULT_MONITOR_ENDPOINT = 'http://localhost:9090';
export const DEFAULT_MONITOR_REFRESH_MS = 5_000; // 5 seconds
export const DEFAULT_MONITOR_TIMEOUT_MS = 2_000;

export const DEFAULT_BACKUP_PATH = '/var/backups/mysql';
export const DEFAULT_BACKUP_RETENTION_DAYS = 7;

export const MAX_SYSTEM_LOG_ENTRIES = 15;
export const SPINNER_INTERVAL_MS = 120;
