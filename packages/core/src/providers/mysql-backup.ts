/**
 * @srvdeck/core — MySQL Backup Provider
 *
 * Dump → gzip → deliver. Local backups land in a directory with
 * retention cleanup; scp and s3 backups are staged in /tmp and removed
 * after transfer.
 */

import { z } from 'zod';
import { posix } from 'node:path';
import { DEFAULT_BACKUP_PATH, DEFAULT_BACKUP_RETENTION_DAYS } from '@srvdeck/shared';
import { ConfigurationError } from '../errors.js';
import { shellQuote, type CommandPlan } from './plan.js';

// ─── Schema ───────────────────────────────────────────────────────

const identifier = (what: string) =>
    z
        .string()
        .trim()
        .min(1, `${what} is required`)
        .regex(/^[A-Za-z0-9_$-]+$/, `${what} may contain only letters, digits, _, $ and -`);

const BaseSchema = z.object({
    database: identifier('Database name'),
    user: identifier('Database user'),
    password: z.string().optional(),
    compress: z.boolean().default(true),
});

export const MysqlBackupSchema = z.discriminatedUnion('destination', [
    BaseSchema.extend({
        destination: z.literal('local'),
        localPath: z.string().trim().min(1).default(DEFAULT_BACKUP_PATH),
        retentionDays: z.number().int().min(0).default(DEFAULT_BACKUP_RETENTION_DAYS),
    }),
    BaseSchema.extend({
        destination: z.literal('scp'),
        remoteHost: z.string().trim().min(1, 'Remote host is required for scp'),
        remoteUser: z.string().trim().min(1, 'Remote user is required for scp'),
        remotePath: z.string().trim().min(1, 'Remote path is required for scp'),
        sshKeyPath: z.string().trim().optional(),
    }),
    BaseSchema.extend({
        destination: z.literal('s3'),
        bucket: z.string().trim().min(1, 'S3 bucket is required'),
        region: z.string().trim().min(1, 'S3 region is required'),
        accessKey: z.string().trim().optional(),
        secretKey: z.string().trim().optional(),
    }),
]);

export type MysqlBackupInput = z.input<typeof MysqlBackupSchema>;
export type MysqlBackupConfig = z.output<typeof MysqlBackupSchema>;
export type BackupDestination = MysqlBackupConfig['destination'];

// ─── Helpers ──────────────────────────────────────────────────────

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** Local time as YYYY-MM-DD_HH-mm-ss */
export function backupTimestamp(now: Date): string {
    const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
    return `${date}_${time}`;
}

export function parseMysqlBackup(input: MysqlBackupInput): MysqlBackupConfig {
    const parsed = MysqlBackupSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigurationError(parsed.error.issues[0]?.message ?? 'invalid backup configuration');
    }
    return parsed.data;
}

// ─── Plan ─────────────────────────────────────────────────────────

export function planMysqlBackup(input: MysqlBackupInput, now: Date = new Date()): CommandPlan {
    const config = parseMysqlBackup(input);
    const fileName = `${config.database}_backup_${backupTimestamp(now)}.sql`;
    const stagingDir = config.destination === 'local' ? config.localPath : '/tmp';
    const workingPath = posix.join(stagingDir, fileName);
    const finalPath = config.compress ? `${workingPath}.gz` : workingPath;
    const dumpFile = shellQuote(workingPath);
    const backupFile = shellQuote(finalPath);

    const steps: Array<[string, string]> = [];

    if (config.destination === 'local') {
        steps.push([`sudo mkdir -p ${shellQuote(config.localPath)}`, 'Creating backup directory...']);
    }

    const auth = config.password ? ` -p${shellQuote(config.password)}` : '';
    steps.push([
        `mysqldump -u ${config.user}${auth} --single-transaction --routines --triggers --opt ${config.database} > ${dumpFile}`,
        `Creating MySQL dump of database: ${config.database}`,
    ]);

    if (config.compress) {
        steps.push([`gzip ${dumpFile}`, 'Compressing backup file...']);
    }

    switch (config.destination) {
        case 'local':
            steps.push([
                `sudo chown mysql:mysql ${backupFile} && sudo chmod 600 ${backupFile}`,
                'Setting secure backup file permissions...',
            ]);
            if (config.retentionDays > 0) {
                steps.push([
                    `find ${shellQuote(config.localPath)} -name '${config.database}_backup_*.sql*' -type f -mtime +${config.retentionDays} -delete`,
                    `Cleaning up backups older than ${config.retentionDays} days...`,
                ]);
            }
            break;

        case 'scp': {
            const key = config.sshKeyPath ? `-i ${shellQuote(config.sshKeyPath)} ` : '';
            const target = `${config.remoteUser}@${config.remoteHost}:${config.remotePath}`;
            steps.push([`scp ${key}${backupFile} ${shellQuote(target)}`, `Transferring backup to ${target}`]);
            steps.push([`rm -f ${backupFile}`, 'Cleaning up temporary backup file...']);
            break;
        }

        case 's3': {
            const s3Path = `s3://${config.bucket}/${posix.basename(finalPath)}`;
            const credentials =
                config.accessKey && config.secretKey
                    ? `AWS_ACCESS_KEY_ID=${shellQuote(config.accessKey)} AWS_SECRET_ACCESS_KEY=${shellQuote(config.secretKey)} `
                    : '';
            steps.push([
                `${credentials}aws s3 cp ${backupFile} ${shellQuote(s3Path)} --region ${shellQuote(config.region)}`,
                `Uploading backup to S3: ${s3Path}`,
            ]);
            steps.push([`rm -f ${backupFile}`, 'Cleaning up temporary backup file...']);
            break;
        }
    }

    return {
        label: `MySQL backup (${config.database} → ${config.destination})`,
        commands: steps.map(([invocation, description]) => ({ invocation, description })),
    };
}
