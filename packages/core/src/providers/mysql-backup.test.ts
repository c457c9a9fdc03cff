import { describe, it, expect } from 'vitest';
import { backupTimestamp, planMysqlBackup } from './mysql-backup.js';
import { ConfigurationError } from '../errors.js';

const NOW = new Date(2026, 0, 2, 3, 4, 5);
const FILE = 'shop_backup_2026-01-02_03-04-05.sql';

describe('backupTimestamp', () => {
    it('formats local time', () => {
        expect(backupTimestamp(NOW)).toBe('2026-01-02_03-04-05');
    });
});

describe('planMysqlBackup', () => {
    it('plans a compressed local backup with retention cleanup', () => {
        const plan = planMysqlBackup(
            { destination: 'local', database: 'shop', user: 'root', password: 'test-secret' },
            NOW,
        );

        expect(plan.label).toBe('MySQL backup (shop → local)');
        expect(plan.commands.map((c) => c.invocation)).toEqual([
            "sudo mkdir -p '/var/backups/mysql'",
            `mysqldump -u root -p'test-secret' --single-transaction --routines --triggers --opt shop > '/var/backups/mysql/${FILE}'`,
            `gzip '/var/backups/mysql/${FILE}'`,
            `sudo chown mysql:mysql '/var/backups/mysql/${FILE}.gz' && sudo chmod 600 '/var/backups/mysql/${FILE}.gz'`,
            "find '/var/backups/mysql' -name 'shop_backup_*.sql*' -type f -mtime +7 -delete",
        ]);
    });

    it('skips retention cleanup when retention is 0', () => {
        const plan = planMysqlBackup(
            { destination: 'local', database: 'shop', user: 'root', retentionDays: 0, compress: false },
            NOW,
        );
        expect(plan.commands.map((c) => c.invocation)).toEqual([
            "sudo mkdir -p '/var/backups/mysql'",
            `mysqldump -u root --single-transaction --routines --triggers --opt shop > '/var/backups/mysql/${FILE}'`,
            `sudo chown mysql:mysql '/var/backups/mysql/${FILE}' && sudo chmod 600 '/var/backups/mysql/${FILE}'`,
        ]);
    });

    it('stages scp backups in /tmp and removes them after transfer', () => {
        const plan = planMysqlBackup(
            {
                destination: 'scp',
                database: 'shop',
                user: 'backup',
                remoteHost: 'backup.example.com',
                remoteUser: 'deploy',
                remotePath: '/srv/backups',
                sshKeyPath: '/root/.ssh/id_ed25519',
            },
            NOW,
        );
        expect(plan.commands.map((c) => c.invocation).slice(-2)).toEqual([
            `scp -i '/root/.ssh/id_ed25519' '/tmp/${FILE}.gz' 'deploy@backup.example.com:/srv/backups'`,
            `rm -f '/tmp/${FILE}.gz'`,
        ]);
        expect(plan.commands[0]?.invocation).toContain(`> '/tmp/${FILE}'`);
    });

    it('uploads to S3 with the region', () => {
        const plan = planMysqlBackup(
            { destination: 's3', database: 'shop', user: 'root', bucket: 'db-dumps', region: 'eu-west-1' },
            NOW,
        );
        expect(plan.commands.map((c) => c.invocation).slice(-2)).toEqual([
            `aws s3 cp '/tmp/${FILE}.gz' 's3://db-dumps/${FILE}.gz' --region 'eu-west-1'`,
            `rm -f '/tmp/${FILE}.gz'`,
        ]);
        expect(plan.commands[plan.commands.length - 2]?.description).toBe(`Uploading backup to S3: s3://db-dumps/${FILE}.gz`);
    });

    it('passes explicit AWS credentials through the environment', () => {
        const plan = planMysqlBackup(
            {
                destination: 's3',
                database: 'shop',
                user: 'root',
                bucket: 'db-dumps',
                region: 'eu-west-1',
                accessKey: 'test-key',
                secretKey: 'test-secret',
            },
            NOW,
        );
        expect(plan.commands.some((c) => c.invocation.startsWith("AWS_ACCESS_KEY_ID='test-key' AWS_SECRET_ACCESS_KEY='test-secret' aws s3 cp"))).toBe(true);
    });

    it('quotes operator-entered paths and hosts', () => {
        const local = planMysqlBackup(
            { destination: 'local', database: 'shop', user: 'root', localPath: '/srv/my backups', compress: false, retentionDays: 0 },
            NOW,
        );
        expect(local.commands.map((c) => c.invocation)).toEqual([
            "sudo mkdir -p '/srv/my backups'",
            `mysqldump -u root --single-transaction --routines --triggers --opt shop > '/srv/my backups/${FILE}'`,
            `sudo chown mysql:mysql '/srv/my backups/${FILE}' && sudo chmod 600 '/srv/my backups/${FILE}'`,
        ]);

        const scp = planMysqlBackup(
            {
                destination: 'scp',
                database: 'shop',
                user: 'root',
                remoteHost: 'backup.example.com',
                remoteUser: 'deploy',
                remotePath: '/srv/nightly dumps',
                sshKeyPath: '/root/keys/backup key',
            },
            NOW,
        );
        expect(scp.commands.find((c) => c.invocation.startsWith('scp'))?.invocation).toBe(
            `scp -i '/root/keys/backup key' '/tmp/${FILE}.gz' 'deploy@backup.example.com:/srv/nightly dumps'`,
        );
    });

    it('rejects incomplete configuration', () => {
        expect(() => planMysqlBackup({ destination: 'local', database: '', user: 'root' }, NOW)).toThrow(
            'Database name is required',
        );
        expect(() =>
            planMysqlBackup(
                { destination: 'scp', database: 'shop', user: 'root', remoteHost: '', remoteUser: 'u', remotePath: '/p' },
                NOW,
            ),
        ).toThrow('Remote host is required for scp');
        expect(() => planMysqlBackup({ destination: 'local', database: 'shop; drop', user: 'root' }, NOW)).toThrow(
            ConfigurationError,
        );
    });
});
