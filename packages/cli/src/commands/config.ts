/**
 * @srvdeck/cli — Config Command
 *
 * Interactive editor for ~/.srvdeck/config.json using @clack/prompts.
 * The prompt flow is thin; validation and the mapping from answers to a
 * config patch are plain functions so they can be tested in isolation.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { CommandLogger } from '@srvdeck/core';
import {
    ConfigStore,
    errorMessage,
    OS_FAMILY_SETTINGS,
    type AppConfig,
    type AppConfigPatch,
    type OsFamilySetting,
} from '@srvdeck/shared';

// ─── Answers ──────────────────────────────────────────────────────

export interface ConfigAnswers {
    readonly shell: string;
    readonly osFamily: OsFamilySetting;
    readonly endpoint: string;
    readonly refreshIntervalMs: string;
    readonly autoRefresh: boolean;
    readonly backupPath: string;
    readonly retentionDays: string;
}

const MIN_REFRESH_MS = 1_000;

export function validateEndpoint(value: string): string | undefined {
    try {
        const url = new URL(value.trim());
        if (url.protocol !== 'http:' && url.protocol !== 'https:') return 'Use an http:// or https:// URL';
        return undefined;
    } catch {
        return 'Enter a valid URL, e.g. http://localhost:9090';
    }
}

export function validateRefreshInterval(value: string): string | undefined {
    if (!/^\d+$/.test(value.trim())) return 'Enter a whole number of milliseconds';
    return Number(value) < MIN_REFRESH_MS ? `Minimum is ${MIN_REFRESH_MS}ms` : undefined;
}

export function validateRetentionDays(value: string): string | undefined {
    return /^\d+$/.test(value.trim()) ? undefined : 'Enter a whole number of days (0 keeps everything)';
}

export function validateNotBlank(value: string): string | undefined {
    return value.trim() === '' ? 'This field is required' : undefined;
}

/** Answers are assumed to have passed the validators above. */
export function buildPatch(answers: ConfigAnswers): AppConfigPatch {
    return {
        shell: answers.shell.trim(),
        osFamily: answers.osFamily,
        monitoring: {
            endpoint: answers.endpoint.trim(),
            refreshIntervalMs: Number(answers.refreshIntervalMs.trim()),
            autoRefresh: answers.autoRefresh,
        },
        backups: {
            localPath: answers.backupPath.trim(),
            retentionDays: Number(answers.retentionDays.trim()),
        },
    };
}

export function saveAnswers(answers: ConfigAnswers): AppConfig {
    return ConfigStore.update(buildPatch(answers));
}

export function describeConfig(config: AppConfig, logPath: string): string {
    return [
        `Shell:            ${config.shell}`,
        `OS override:      ${config.osFamily}`,
        `Monitoring:       ${config.monitoring.endpoint} every ${config.monitoring.refreshIntervalMs}ms (auto-refresh ${config.monitoring.autoRefresh ? 'on' : 'off'})`,
        `Backups:          ${config.backups.localPath}, keep ${config.backups.retentionDays} days`,
        `Command log:      ${logPath}`,
    ].join('\n');
}

// ─── Interactive Config Command ───────────────────────────────────

async function askAnswers(current: AppConfig): Promise<ConfigAnswers | undefined> {
    const shell = await p.text({ message: 'Shell used to run commands', initialValue: current.shell, validate: validateNotBlank });
    if (p.isCancel(shell)) return undefined;

    const osFamily = await p.select({
        message: 'Target OS family',
        initialValue: current.osFamily,
        options: OS_FAMILY_SETTINGS.map((value) => ({
            value,
            label: value,
            ...(value === 'auto' ? { hint: 'detect from /etc/os-release' } : {}),
        })),
    });
    if (p.isCancel(osFamily)) return undefined;
    const family = OS_FAMILY_SETTINGS.find((setting) => setting === osFamily) ?? 'auto';

    const endpoint = await p.text({
        message: 'Monitoring agent endpoint',
        initialValue: current.monitoring.endpoint,
        validate: validateEndpoint,
    });
    if (p.isCancel(endpoint)) return undefined;

    const refreshIntervalMs = await p.text({
        message: 'Monitoring refresh interval (ms)',
        initialValue: String(current.monitoring.refreshIntervalMs),
        validate: validateRefreshInterval,
    });
    if (p.isCancel(refreshIntervalMs)) return undefined;

    const autoRefresh = await p.confirm({ message: 'Refresh monitoring automatically?', initialValue: current.monitoring.autoRefresh });
    if (p.isCancel(autoRefresh)) return undefined;

    const backupPath = await p.text({
        message: 'Local MySQL backup directory',
        initialValue: current.backups.localPath,
        validate: validateNotBlank,
    });
    if (p.isCancel(backupPath)) return undefined;

    const retentionDays = await p.text({
        message: 'Days to keep local backups',
        initialValue: String(current.backups.retentionDays),
        validate: validateRetentionDays,
    });
    if (p.isCancel(retentionDays)) return undefined;

    return { shell, osFamily: family, endpoint, refreshIntervalMs, autoRefresh, backupPath, retentionDays };
}

export async function configCommand(): Promise<void> {
    p.intro(pc.bgRed(pc.white(' 🔧 srvdeck — Configuration ')));

    let current: AppConfig;
    try {
        current = ConfigStore.read();
    } catch (err) {
        p.log.error(errorMessage(err));
        const reset = await p.confirm({ message: 'Replace the invalid file with the defaults?', initialValue: false });
        if (p.isCancel(reset) || !reset) {
            p.outro('Nothing changed.');
            process.exit(1);
        }
        current = ConfigStore.reset();
    }

    p.note(describeConfig(current, ConfigStore.logFilePath(current)), ConfigStore.exists() ? ConfigStore.configPath : 'Defaults');

    const choice = await p.select({
        message: 'What would you like to do?',
        options: [
            { value: 'edit', label: '✏️  Edit settings' },
            { value: 'reset', label: '🔄 Reset to defaults' },
            { value: 'clear-log', label: '🧹 Clear the command log' },
            { value: 'exit', label: '🚪 Exit' },
        ],
    });

    if (p.isCancel(choice) || choice === 'exit') {
        p.outro('Nothing changed.');
        return;
    }

    switch (choice) {
        case 'edit': {
            const answers = await askAnswers(current);
            if (answers === undefined) {
                p.outro('Cancelled, nothing saved.');
                return;
            }
            saveAnswers(answers);
            p.outro(pc.green(`Saved to ${ConfigStore.configPath}`));
            return;
        }

        case 'reset': {
            const sure = await p.confirm({ message: 'Reset every setting to its default?', initialValue: false });
            if (p.isCancel(sure) || !sure) {
                p.outro('Nothing changed.');
                return;
            }
            ConfigStore.reset();
            p.outro(pc.green('Configuration reset to defaults.'));
            return;
        }

        case 'clear-log': {
            const log = new CommandLogger(ConfigStore.logFilePath(current));
            log.clear();
            p.outro(pc.green(`Cleared ${log.path}`));
            return;
        }
    }
}
