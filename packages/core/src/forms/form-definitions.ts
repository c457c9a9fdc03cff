/**
 * @srvdeck/core — Form Definitions
 *
 * The form screens: their fields, and how submitted values become a
 * command plan. Plans are built through the providers, which re-validate
 * and throw ConfigurationError / ProviderError for the view to show.
 */

import type { AppConfig, OsFamily } from '@srvdeck/shared';
import type { FormState } from '../engine/navigation.js';
import { ConfigurationError } from '../errors.js';
import { planMysqlBackup, type MysqlBackupInput } from '../providers/mysql-backup.js';
import type { CommandPlan } from '../providers/plan.js';
import { planSecurityHardening } from '../providers/security.js';
import {
    PACKAGE_MANAGERS,
    planLaravelQueueWorker,
    planLaravelSite,
    planLaravelUpdate,
    planNextjsSite,
    planNextjsUpdate,
    QUEUE_CONNECTIONS,
    type PackageManager,
    type QueueConnection,
} from '../providers/sites.js';
import type { FieldSpec, FormValues } from './form-model.js';
import { validateBranch, validateDomain, validateGitUrl, validatePort, validateSiteName } from './validation.js';

export interface FormContext {
    readonly os: OsFamily;
    readonly config: AppConfig;
    readonly now: Date;
}

export interface FormDefinition {
    readonly state: FormState;
    readonly title: string;
    readonly fields: readonly FieldSpec[];
    plan(values: FormValues, context: FormContext): CommandPlan;
}

const YES_NO = ['yes', 'no'] as const;
const NO_YES = ['no', 'yes'] as const;

// ─── Helpers ──────────────────────────────────────────────────────

function text(values: FormValues, key: string): string | undefined {
    const value = values[key]?.trim() ?? '';
    return value === '' ? undefined : value;
}

function integer(values: FormValues, key: string): number | undefined {
    const value = text(values, key);
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value)) throw new ConfigurationError(`${key} must be a whole number`);
    return Number(value);
}

function yes(values: FormValues, key: string): boolean {
    return values[key] === 'yes';
}

function packageManager(value: string | undefined): PackageManager | undefined {
    return PACKAGE_MANAGERS.find((pm) => pm === value);
}

function queueConnection(value: string | undefined): QueueConnection | undefined {
    return QUEUE_CONNECTIONS.find((connection) => connection === value);
}

// ─── MySQL backup ─────────────────────────────────────────────────

const BACKUP_DESTINATIONS = ['local', 'scp', 's3'] as const;

function backupInput(values: FormValues, config: AppConfig): MysqlBackupInput {
    const base = {
        database: values['database'] ?? '',
        user: values['user'] ?? '',
        password: text(values, 'password'),
        compress: yes(values, 'compress'),
    };
    switch (values['destination']) {
        case 'scp':
            return {
                ...base,
                destination: 'scp',
                remoteHost: values['remoteHost'] ?? '',
                remoteUser: values['remoteUser'] ?? '',
                remotePath: values['remotePath'] ?? '',
                sshKeyPath: text(values, 'sshKeyPath'),
            };
        case 's3':
            return {
                ...base,
                destination: 's3',
                bucket: values['bucket'] ?? '',
                region: values['region'] ?? '',
                accessKey: text(values, 'accessKey'),
                secretKey: text(values, 'secretKey'),
            };
        default:
            return {
                ...base,
                destination: 'local',
                localPath: text(values, 'localPath') ?? config.backups.localPath,
                retentionDays: integer(values, 'retentionDays') ?? config.backups.retentionDays,
            };
    }
}

const mysqlBackupForm: FormDefinition = {
    state: 'mysql-backup-form',
    title: '💾 MySQL Backup',
    fields: [
        { key: 'database', label: 'Database name', kind: 'text', required: true },
        { key: 'user', label: 'Database user', kind: 'text', required: true, defaultValue: 'root' },
        { key: 'password', label: 'Password (blank for socket auth)', kind: 'password' },
        { key: 'destination', label: 'Destination', kind: 'select', options: BACKUP_DESTINATIONS },
        { key: 'compress', label: 'Compress with gzip', kind: 'select', options: YES_NO },
        { key: 'localPath', label: 'Local directory (local)', kind: 'text', placeholder: '/var/backups/mysql' },
        { key: 'retentionDays', label: 'Retention days (local)', kind: 'number', placeholder: '7' },
        { key: 'remoteHost', label: 'Remote host (scp)', kind: 'text' },
        { key: 'remoteUser', label: 'Remote user (scp)', kind: 'text' },
        { key: 'remotePath', label: 'Remote path (scp)', kind: 'text' },
        { key: 'sshKeyPath', label: 'SSH key path (scp)', kind: 'text', placeholder: '~/.ssh/id_ed25519' },
        { key: 'bucket', label: 'S3 bucket (s3)', kind: 'text' },
        { key: 'region', label: 'S3 region (s3)', kind: 'text', placeholder: 'us-east-1' },
        { key: 'accessKey', label: 'AWS access key (s3, optional)', kind: 'text' },
        { key: 'secretKey', label: 'AWS secret key (s3, optional)', kind: 'password' },
    ],
    plan: (values, { config, now }) => planMysqlBackup(backupInput(values, config), now),
};

// ─── Security hardening ───────────────────────────────────────────

const securityForm: FormDefinition = {
    state: 'security-form',
    title: '🛡️ Security Hardening',
    fields: [
        { key: 'sshPort', label: 'SSH port (blank keeps 22)', kind: 'number', validate: validatePort },
        { key: 'disableRootLogin', label: 'Disable root login', kind: 'select', options: YES_NO },
        { key: 'disablePasswordAuth', label: 'Disable password authentication', kind: 'select', options: NO_YES },
        { key: 'firewall', label: 'Configure firewall', kind: 'select', options: YES_NO },
        { key: 'fail2ban', label: 'Install Fail2ban', kind: 'select', options: YES_NO },
        { key: 'autoUpdates', label: 'Automatic security updates', kind: 'select', options: YES_NO },
    ],
    plan: (values, { os, now }) =>
        planSecurityHardening(
            {
                sshPort: integer(values, 'sshPort'),
                disableRootLogin: yes(values, 'disableRootLogin'),
                disablePasswordAuth: yes(values, 'disablePasswordAuth'),
                firewall: yes(values, 'firewall'),
                fail2ban: yes(values, 'fail2ban'),
                autoUpdates: yes(values, 'autoUpdates'),
            },
            os,
            now,
        ),
};

// ─── Sites ────────────────────────────────────────────────────────

const siteFields: readonly FieldSpec[] = [
    { key: 'siteName', label: 'Site name', kind: 'text', required: true, minLength: 2, validate: validateSiteName },
    { key: 'domain', label: 'Domain', kind: 'text', required: true, validate: validateDomain },
    { key: 'gitRepo', label: 'Git repository (blank for a new app)', kind: 'url', validate: validateGitUrl },
    { key: 'branch', label: 'Branch (blank for default)', kind: 'text', validate: validateBranch },
];

const laravelSiteForm: FormDefinition = {
    state: 'laravel-site-form',
    title: '🐘 New Laravel Site',
    fields: siteFields,
    plan: (values, { os }) =>
        planLaravelSite(
            {
                siteName: values['siteName'] ?? '',
                domain: values['domain'] ?? '',
                gitRepo: text(values, 'gitRepo'),
                branch: text(values, 'branch'),
            },
            os,
        ),
};

const nextjsSiteForm: FormDefinition = {
    state: 'nextjs-site-form',
    title: '▲ New Next.js Site',
    fields: [
        ...siteFields,
        { key: 'packageManager', label: 'Package manager', kind: 'select', options: PACKAGE_MANAGERS },
        { key: 'port', label: 'Port', kind: 'number', defaultValue: '3000', validate: validatePort },
    ],
    plan: (values, { os }) =>
        planNextjsSite(
            {
                siteName: values['siteName'] ?? '',
                domain: values['domain'] ?? '',
                gitRepo: text(values, 'gitRepo'),
                branch: text(values, 'branch'),
                packageManager: packageManager(values['packageManager']),
                port: integer(values, 'port'),
            },
            os,
        ),
};

// ─── Site maintenance ─────────────────────────────────────────────

const existingSite: FieldSpec = {
    key: 'siteName',
    label: 'Site name (directory under /var/www)',
    kind: 'text',
    required: true,
    minLength: 2,
    validate: validateSiteName,
};

const switchBranch: FieldSpec = {
    key: 'branch',
    label: 'Switch to branch (blank keeps the current one)',
    kind: 'text',
    validate: validateBranch,
};

const laravelUpdateForm: FormDefinition = {
    state: 'laravel-update-form',
    title: '🔄 Update Laravel Site',
    fields: [existingSite, switchBranch],
    plan: (values, { os }) =>
        planLaravelUpdate({ siteName: values['siteName'] ?? '', branch: text(values, 'branch') }, os),
};

const laravelQueueForm: FormDefinition = {
    state: 'laravel-queue-form',
    title: '⏱️ Laravel Queue Worker',
    fields: [
        existingSite,
        { key: 'connection', label: 'Queue connection', kind: 'select', options: QUEUE_CONNECTIONS },
        { key: 'queue', label: 'Queue name(s), comma separated', kind: 'text', defaultValue: 'default' },
        { key: 'processes', label: 'Worker processes', kind: 'number', defaultValue: '1' },
    ],
    plan: (values, { os }) =>
        planLaravelQueueWorker(
            {
                siteName: values['siteName'] ?? '',
                connection: queueConnection(values['connection']),
                queue: text(values, 'queue'),
                processes: integer(values, 'processes'),
            },
            os,
        ),
};

const nextjsUpdateForm: FormDefinition = {
    state: 'nextjs-update-form',
    title: '🔄 Update Next.js Site',
    fields: [
        existingSite,
        switchBranch,
        { key: 'packageManager', label: 'Package manager', kind: 'select', options: PACKAGE_MANAGERS },
    ],
    plan: (values, { os }) =>
        planNextjsUpdate(
            {
                siteName: values['siteName'] ?? '',
                branch: text(values, 'branch'),
                packageManager: packageManager(values['packageManager']),
            },
            os,
        ),
};

export const FORM_DEFINITIONS: { readonly [S in FormState]: FormDefinition } = {
    'mysql-backup-form': mysqlBackupForm,
    'security-form': securityForm,
    'laravel-site-form': laravelSiteForm,
    'nextjs-site-form': nextjsSiteForm,
    'laravel-update-form': laravelUpdateForm,
    'laravel-queue-form': laravelQueueForm,
    'nextjs-update-form': nextjsUpdateForm,
};
