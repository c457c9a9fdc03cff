/**
 * @srvdeck/shared — Config Store
 *
 * Manages persistent settings stored in ~/.srvdeck/config.json
 * (or $SRVDECK_HOME/config.json). The file is validated with zod;
 * any field left out takes its default.
 *
 * Security: directory is created with 0o700 (owner only),
 * config file with 0o600 (owner read/write only).
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import {
    DEFAULT_BACKUP_PATH,
    DEFAULT_BACKUP_RETENTION_DAYS,
    DEFAULT_MONITOR_ENDPOINT,
    DEFAULT_MONITOR_REFRESH_MS,
    DEFAULT_MONITOR_TIMEOUT_MS,
    DEFAULT_SHELL,
} from '../constants.js';
import { errorMessage } from '../utils/error-message.js';

// ─── Schema ───────────────────────────────────────────────────────

export const OS_FAMILY_SETTINGS = ['auto', 'ubuntu', 'fedora'] as const;

const MonitoringSchema = z.object({
    endpoint: z.string().url().default(DEFAULT_MONITOR_ENDPOINT),
    refreshIntervalMs: z.number().int().min(1_000).default(DEFAULT_MONITOR_REFRESH_MS),
    autoRefresh: z.boolean().default(true),
    timeoutMs: z.number().int().positive().default(DEFAULT_MONITOR_TIMEOUT_MS),
});

const BackupsSchema = z.object({
    localPath: z.string().min(1).default(DEFAULT_BACKUP_PATH),
    retentionDays: z.number().int().min(0).default(DEFAULT_BACKUP_RETENTION_DAYS),
});

export const AppConfigSchema = z.object({
    /** Schema version for future migrations */
    version: z.literal(1).default(1),
    /** Interpreter used as `<shell> -c <command>` */
    shell: z.string().min(1).default(DEFAULT_SHELL),
    /** Overrides <config dir>/logs/commands.log */
    logFile: z.string().min(1).optional(),
    osFamily: z.enum(OS_FAMILY_SETTINGS).default('auto'),
    monitoring: MonitoringSchema.default({}),
    backups: BackupsSchema.default({}),
});

// ─── Types ────────────────────────────────────────────────────────

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type OsFamilySetting = AppConfig['osFamily'];

export interface AppConfigPatch {
    readonly shell?: string;
    readonly logFile?: string;
    readonly osFamily?: OsFamilySetting;
    readonly monitoring?: Partial<AppConfig['monitoring']>;
    readonly backups?: Partial<AppConfig['backups']>;
}

/** Raised when config.json exists but cannot be parsed or fails validation. */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

// ─── Helpers ──────────────────────────────────────────────────────

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

// ─── ConfigStore Class ────────────────────────────────────────────

export class ConfigStore {
    /** In-memory cache to avoid repeated disk reads */
    private static cache: AppConfig | undefined = undefined;

    /** Directory holding config.json and logs/ */
    static get dir(): string {
        return process.env['SRVDECK_HOME'] ?? join(homedir(), '.srvdeck');
    }

    static get configPath(): string {
        return join(this.dir, 'config.json');
    }

    static exists(): boolean {
        return existsSync(this.configPath);
    }

    static defaults(): AppConfig {
        return AppConfigSchema.parse({});
    }

    /** Read config from disk (with in-memory cache). A missing file yields the defaults. */
    static read(): AppConfig {
        if (this.cache !== undefined) return this.cache;

        if (!this.exists()) {
            this.cache = this.defaults();
            return this.cache;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(this.configPath, 'utf-8'));
        } catch (err) {
            throw new ConfigError(`${this.configPath} is not valid JSON: ${errorMessage(err)}`);
        }

        const parsed = AppConfigSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigError(`${this.configPath} is invalid: ${describeIssues(parsed.error)}`);
        }
        this.cache = parsed.data;
        return parsed.data;
    }

    /** Validate, write to disk and update cache */
    static write(config: AppConfig): AppConfig {
        const parsed = AppConfigSchema.safeParse(config);
        if (!parsed.success) {
            throw new ConfigError(`Refusing to write invalid config: ${describeIssues(parsed.error)}`);
        }

        if (!existsSync(this.dir)) {
            mkdirSync(this.dir, { recursive: true, mode: 0o700 });
        }

        writeFileSync(this.configPath, JSON.stringify(parsed.data, null, 2), {
            encoding: 'utf-8',
            mode: 0o600,
        });

        this.cache = parsed.data;
        return parsed.data;
    }

    /** Shallow-merge top-level fields, one level deeper for `monitoring` and `backups`. */
    static update(patch: AppConfigPatch): AppConfig {
        const current = this.read();
        return this.write({
            ...current,
            ...(patch.shell !== undefined ? { shell: patch.shell } : {}),
            ...(patch.logFile !== undefined ? { logFile: patch.logFile } : {}),
            ...(patch.osFamily !== undefined ? { osFamily: patch.osFamily } : {}),
            monitoring: { ...current.monitoring, ...patch.monitoring },
            backups: { ...current.backups, ...patch.backups },
        });
    }

    static reset(): AppConfig {
        return this.write(this.defaults());
    }

    /** Clear the in-memory cache (forces next read from disk) */
    static clearCache(): void {
        this.cache = undefined;
    }

    /** Where the command execution log lives for a given config */
    static logFilePath(config: AppConfig): string {
        return config.logFile ?? join(this.dir, 'logs', 'commands.log');
    }
}
