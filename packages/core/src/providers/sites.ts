/**
 * @srvdeck/core — Site Stacks
 *
 * Laravel (PHP-FPM behind Caddy) and Next.js (PM2 behind Caddy) sites
 * under /var/www. Each site gets its own Caddy file in
 * /etc/caddy/sites, imported by the main Caddyfile.
 *
 * Git runs as root (`sudo git`), so the deploy key is root's and
 * ownership is handed back to the web user after every checkout.
 */

import { z } from 'zod';
import type { OsFamily } from '@srvdeck/shared';
import { ConfigurationError, ProviderError } from '../errors.js';
import { BranchSchema, DomainSchema, GitUrlSchema, SiteNameSchema } from '../forms/validation.js';
import type { CommandPlan } from './plan.js';

// ─── Schemas ──────────────────────────────────────────────────────

const optional = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

const SiteBaseSchema = z.object({
    siteName: SiteNameSchema,
    domain: DomainSchema,
    gitRepo: optional(GitUrlSchema),
    branch: optional(BranchSchema),
});

export const LaravelSiteSchema = SiteBaseSchema;

export const PACKAGE_MANAGERS = ['npm', 'yarn', 'pnpm'] as const;

export const NextjsSiteSchema = SiteBaseSchema.extend({
    packageManager: z.enum(PACKAGE_MANAGERS).default('npm'),
    port: z
        .number()
        .int()
        .min(1024, 'port must be between 1024 and 65535')
        .max(65535, 'port must be between 1024 and 65535')
        .default(3000),
});

export const SiteUpdateSchema = z.object({
    siteName: SiteNameSchema,
    /** Switch to this branch first; blank pulls the current one */
    branch: optional(BranchSchema),
});

export const NextjsUpdateSchema = SiteUpdateSchema.extend({
    packageManager: z.enum(PACKAGE_MANAGERS).default('npm'),
});

export const QUEUE_CONNECTIONS = ['database', 'redis', 'sqs', 'beanstalkd'] as const;

export const QueueWorkerSchema = z.object({
    siteName: SiteNameSchema,
    connection: z.enum(QUEUE_CONNECTIONS).default('database'),
    queue: z
        .string()
        .regex(/^[\w-]+(,[\w-]+)*$/, 'queue names may only contain letters, digits, "-" and "_", separated by commas')
        .default('default'),
    processes: z
        .number()
        .int()
        .min(1, 'processes must be between 1 and 16')
        .max(16, 'processes must be between 1 and 16')
        .default(1),
});

export type LaravelSiteInput = z.input<typeof LaravelSiteSchema>;
export type LaravelSiteConfig = z.output<typeof LaravelSiteSchema>;
export type NextjsSiteInput = z.input<typeof NextjsSiteSchema>;
export type NextjsSiteConfig = z.output<typeof NextjsSiteSchema>;
export type PackageManager = NextjsSiteConfig['packageManager'];
export type SiteUpdateInput = z.input<typeof SiteUpdateSchema>;
export type NextjsUpdateInput = z.input<typeof NextjsUpdateSchema>;
export type QueueWorkerInput = z.input<typeof QueueWorkerSchema>;
export type QueueWorkerConfig = z.output<typeof QueueWorkerSchema>;
export type QueueConnection = QueueWorkerConfig['connection'];

const SITES_ROOT = '/var/www';
const ROOT_SSH_DIR = '/root/.ssh';
const CADDY_SITES = '/etc/caddy/sites';

type Step = [string, string];
type SupportedOs = Exclude<OsFamily, 'unknown'>;

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigurationError(parsed.error.issues[0]?.message ?? `invalid ${what} configuration`);
    }
    return parsed.data;
}

export function parseLaravelSite(input: LaravelSiteInput): LaravelSiteConfig {
    return parseWith(LaravelSiteSchema, input, 'Laravel site');
}

export function parseNextjsSite(input: NextjsSiteInput): NextjsSiteConfig {
    return parseWith(NextjsSiteSchema, input, 'Next.js site');
}

function supported(os: OsFamily): SupportedOs {
    if (os === 'unknown') {
        throw new ProviderError(`unsupported operating system: ${os}`);
    }
    return os;
}

/** User PHP-FPM and Node processes run as. */
export function webUser(os: SupportedOs): string {
    return os === 'ubuntu' ? 'www-data' : 'apache';
}

function phpFpmService(os: SupportedOs): string {
    return os === 'ubuntu' ? 'php8.4-fpm' : 'php-fpm';
}

function phpFpmSocket(os: SupportedOs): string {
    return os === 'ubuntu' ? '/run/php/php8.4-fpm.sock' : '/run/php-fpm/www.sock';
}

// ─── Shared steps ─────────────────────────────────────────────────

function cloneStep(config: LaravelSiteConfig, sitePath: string, what: string): Step | null {
    if (config.gitRepo === undefined) return null;
    const branch = config.branch !== undefined ? ` -b ${config.branch}` : '';
    return [
        `sudo git clone${branch} ${config.gitRepo} ${sitePath}`,
        `Cloning ${what} from ${config.gitRepo} (branch: ${config.branch ?? 'default'})...`,
    ];
}

/** Write a file through a quoted heredoc so nothing in `body` is expanded. */
function writeFileStep(path: string, body: string, description: string): Step {
    return [`sudo tee ${path} > /dev/null <<'SRVDECK_EOF'\n${body}\nSRVDECK_EOF`, description];
}

function caddySteps(domain: string, siteBlock: string): Step[] {
    return [
        [`sudo mkdir -p ${CADDY_SITES}`, 'Creating Caddy sites directory...'],
        writeFileStep(`${CADDY_SITES}/${domain}.caddy`, siteBlock, 'Creating Caddy site configuration...'),
        [
            `grep -q 'import sites/\\*' /etc/caddy/Caddyfile 2>/dev/null || echo 'import sites/*' | sudo tee -a /etc/caddy/Caddyfile > /dev/null`,
            'Updating main Caddyfile...',
        ],
        ['sudo systemctl enable --now caddy', 'Starting Caddy server...'],
        ['sudo systemctl reload caddy || sudo systemctl restart caddy', 'Reloading Caddy configuration...'],
    ];
}

const SECURITY_HEADERS = [
    '    header {',
    '        Strict-Transport-Security "max-age=31536000; includeSubDomains"',
    '        X-Content-Type-Options nosniff',
    '        X-Frame-Options DENY',
    '        Referrer-Policy strict-origin-when-cross-origin',
    '    }',
];

/** Fails the plan early when the site was not deployed from Git. */
function gitCheckoutCheck(sitePath: string): Step {
    return [`sudo test -d ${sitePath}/.git`, `Checking that ${sitePath} is a Git checkout...`];
}

function pullStep(sitePath: string, branch: string | undefined): Step {
    const git = `sudo git -c safe.directory=${sitePath}`;
    if (branch === undefined) {
        return [`cd ${sitePath} && ${git} pull --ff-only`, 'Pulling latest changes (current branch)...'];
    }
    return [
        `cd ${sitePath} && ${git} fetch origin && ${git} checkout ${branch} && ${git} pull --ff-only origin ${branch}`,
        `Switching to branch ${branch} and pulling latest changes...`,
    ];
}

function toPlan(label: string, steps: Array<Step | null>): CommandPlan {
    return {
        label,
        commands: steps
            .filter((step): step is Step => step !== null)
            .map(([invocation, description]) => ({ invocation, description })),
    };
}

// ─── Laravel ──────────────────────────────────────────────────────

export function laravelCaddyfile(domain: string, sitePath: string, os: SupportedOs): string {
    return [
        `${domain} {`,
        `    root * ${sitePath}/public`,
        `    php_fastcgi unix/${phpFpmSocket(os)}`,
        '    file_server',
        '    encode gzip',
        ...SECURITY_HEADERS,
        '}',
    ].join('\n');
}

export function planLaravelSite(input: LaravelSiteInput, osFamily: OsFamily): CommandPlan {
    const config = parseLaravelSite(input);
    const os = supported(osFamily);
    const sitePath = `${SITES_ROOT}/${config.siteName}`;
    const user = webUser(os);

    return toPlan(`Laravel site ${config.domain}`, [
        [`sudo mkdir -p ${SITES_ROOT}`, 'Creating base directory...'],
        cloneStep(config, sitePath, 'Laravel app') ?? [
            `sudo composer create-project --no-interaction laravel/laravel ${sitePath}`,
            `Creating fresh Laravel installation at ${sitePath}...`,
        ],
        [
            `cd ${sitePath} && sudo composer install --no-dev --optimize-autoloader --no-interaction`,
            'Installing Composer dependencies...',
        ],
        [
            `cd ${sitePath} && sudo cp -n .env.example .env && sudo php artisan key:generate --force`,
            'Generating app key...',
        ],
        [`sudo chown -R ${user}:${user} ${sitePath}`, `Setting ownership to ${user}...`],
        [
            `sudo find ${sitePath} -type d -exec chmod 755 {} + && sudo find ${sitePath} -type f -exec chmod 644 {} +`,
            'Setting file permissions...',
        ],
        [
            `sudo chmod -R 775 ${sitePath}/storage ${sitePath}/bootstrap/cache`,
            'Setting writable permissions for storage and cache...',
        ],
        [`sudo systemctl enable --now ${phpFpmService(os)}`, 'Starting PHP-FPM service...'],
        ...caddySteps(config.domain, laravelCaddyfile(config.domain, sitePath, os)),
    ]);
}

export function planLaravelUpdate(input: SiteUpdateInput, osFamily: OsFamily): CommandPlan {
    const config = parseWith(SiteUpdateSchema, input, 'site update');
    const os = supported(osFamily);
    const sitePath = `${SITES_ROOT}/${config.siteName}`;
    const user = webUser(os);
    const artisan = (command: string): string => `cd ${sitePath} && sudo php artisan ${command}`;

    return toPlan(`Update Laravel site ${config.siteName}`, [
        gitCheckoutCheck(sitePath),
        [artisan('down'), 'Putting site in maintenance mode...'],
        pullStep(sitePath, config.branch),
        [
            `cd ${sitePath} && sudo composer install --no-dev --optimize-autoloader --no-interaction`,
            'Updating Composer dependencies...',
        ],
        [artisan('migrate --force'), 'Running database migrations...'],
        [artisan('cache:clear'), 'Clearing application cache...'],
        [artisan('config:clear'), 'Clearing configuration cache...'],
        [artisan('view:clear'), 'Clearing view cache...'],
        [`sudo chown -R ${user}:${user} ${sitePath}`, `Setting ownership to ${user}...`],
        [
            `sudo find ${sitePath} -type d -exec chmod 755 {} + && sudo find ${sitePath} -type f -exec chmod 644 {} +`,
            'Setting file permissions...',
        ],
        [
            `sudo chmod -R 775 ${sitePath}/storage ${sitePath}/bootstrap/cache`,
            'Setting writable permissions for storage and cache...',
        ],
        [artisan('up'), 'Bringing site back online...'],
    ]);
}

export function queueWorkerName(siteName: string): string {
    return `laravel-worker-${siteName}`;
}

export function supervisorProgram(config: QueueWorkerConfig, sitePath: string, user: string): string {
    return [
        `[program:${queueWorkerName(config.siteName)}]`,
        'process_name=%(program_name)s_%(process_num)02d',
        `command=php ${sitePath}/artisan queue:work ${config.connection} --sleep=3 --tries=3 --max-time=3600 --queue=${config.queue}`,
        'autostart=true',
        'autorestart=true',
        'stopasgroup=true',
        'killasgroup=true',
        `user=${user}`,
        `numprocs=${config.processes}`,
        'redirect_stderr=true',
        `stdout_logfile=${sitePath}/storage/logs/worker.log`,
        'stdout_logfile_maxbytes=100MB',
        'stdout_logfile_backups=2',
        'stopwaitsecs=3600',
    ].join('\n');
}

export function planLaravelQueueWorker(input: QueueWorkerInput, osFamily: OsFamily): CommandPlan {
    const config = parseWith(QueueWorkerSchema, input, 'queue worker');
    const os = supported(osFamily);
    const sitePath = `${SITES_ROOT}/${config.siteName}`;
    const user = webUser(os);
    const worker = queueWorkerName(config.siteName);
    // Debian ships supervisor with conf.d/*.conf; Fedora's supervisord reads supervisord.d/*.ini
    const programPath = os === 'ubuntu' ? `/etc/supervisor/conf.d/${worker}.conf` : `/etc/supervisord.d/${worker}.ini`;
    const service = os === 'ubuntu' ? 'supervisor' : 'supervisord';

    return toPlan(`Queue worker for ${config.siteName}`, [
        [`sudo test -f ${sitePath}/artisan`, `Checking that ${sitePath} is a Laravel app...`],
        [`sudo mkdir -p ${sitePath}/storage/logs`, 'Creating log directory...'],
        [`sudo chown -R ${user}:${user} ${sitePath}/storage/logs`, `Setting log permissions for ${user}...`],
        writeFileStep(programPath, supervisorProgram(config, sitePath, user), 'Creating Supervisor configuration...'),
        [`sudo systemctl enable --now ${service}`, 'Starting Supervisor...'],
        ['sudo supervisorctl reread', 'Reloading Supervisor configuration...'],
        ['sudo supervisorctl update', 'Updating Supervisor...'],
        [`sudo supervisorctl start '${worker}:*'`, `Starting ${config.processes} queue worker process(es)...`],
    ]);
}

// ─── Next.js ──────────────────────────────────────────────────────

export function pm2Ecosystem(siteName: string, sitePath: string, port: number): string {
    const app = {
        name: siteName,
        script: `${sitePath}/node_modules/.bin/next`,
        args: `start -p ${port}`,
        cwd: sitePath,
        instances: 1,
        exec_mode: 'cluster',
        env: { NODE_ENV: 'production', PORT: String(port) },
        error_file: `/var/log/pm2/${siteName}-error.log`,
        out_file: `/var/log/pm2/${siteName}-out.log`,
    };
    return JSON.stringify({ apps: [app] }, null, 2);
}

export function nextjsCaddyfile(domain: string, port: number): string {
    return [`${domain} {`, `    reverse_proxy localhost:${port}`, '    encode gzip', ...SECURITY_HEADERS, '}'].join(
        '\n',
    );
}

export function planNextjsSite(input: NextjsSiteInput, osFamily: OsFamily): CommandPlan {
    const config = parseNextjsSite(input);
    const os = supported(osFamily);
    const sitePath = `${SITES_ROOT}/${config.siteName}`;
    const user = webUser(os);
    const pm = config.packageManager;
    const ecosystemPath = `/etc/pm2/ecosystem.${config.siteName}.json`;

    return toPlan(`Next.js site ${config.domain}`, [
        [`sudo mkdir -p ${SITES_ROOT}`, 'Creating base directory...'],
        cloneStep(config, sitePath, 'repository') ?? [
            `sudo npx --yes create-next-app@latest ${sitePath} --typescript --eslint --app --use-${pm}`,
            'Creating new Next.js application...',
        ],
        [`sudo chown -R ${user}:${user} ${sitePath}`, `Setting ownership to ${user}...`],
        [`cd ${sitePath} && sudo -u ${user} ${pm} install`, 'Installing dependencies...'],
        [`cd ${sitePath} && sudo -u ${user} ${pm} run build`, 'Building Next.js application...'],
        ['sudo mkdir -p /etc/pm2 /var/log/pm2', 'Creating PM2 directories...'],
        writeFileStep(
            ecosystemPath,
            pm2Ecosystem(config.siteName, sitePath, config.port),
            'Creating PM2 configuration...',
        ),
        [`sudo pm2 start ${ecosystemPath}`, 'Starting Next.js application with PM2...'],
        ['sudo pm2 save', 'Saving PM2 process list...'],
        ...caddySteps(config.domain, nextjsCaddyfile(config.domain, config.port)),
    ]);
}

export function planNextjsUpdate(input: NextjsUpdateInput, osFamily: OsFamily): CommandPlan {
    const config = parseWith(NextjsUpdateSchema, input, 'site update');
    const os = supported(osFamily);
    const sitePath = `${SITES_ROOT}/${config.siteName}`;
    const user = webUser(os);
    const pm = config.packageManager;

    return toPlan(`Update Next.js site ${config.siteName}`, [
        gitCheckoutCheck(sitePath),
        pullStep(sitePath, config.branch),
        [`sudo chown -R ${user}:${user} ${sitePath}`, `Setting ownership to ${user}...`],
        [`cd ${sitePath} && sudo -u ${user} ${pm} install`, 'Installing dependencies...'],
        [`cd ${sitePath} && sudo -u ${user} ${pm} run build`, 'Building Next.js application...'],
        [`sudo pm2 restart ${config.siteName}`, `Restarting ${config.siteName} with PM2...`],
        ['sudo pm2 save', 'Saving PM2 process list...'],
    ]);
}

// ─── GitHub access ────────────────────────────────────────────────

/** Root's deploy key for the `sudo git` clones and pulls above. Idempotent. */
export function planGithubSshKey(): CommandPlan {
    const key = `${ROOT_SSH_DIR}/id_ed25519`;
    const knownHosts = `${ROOT_SSH_DIR}/known_hosts`;
    return toPlan('GitHub SSH key', [
        [`sudo mkdir -p ${ROOT_SSH_DIR} && sudo chmod 700 ${ROOT_SSH_DIR}`, `Preparing ${ROOT_SSH_DIR}...`],
        [
            `sudo test -f ${key} || sudo ssh-keygen -t ed25519 -N '' -C "srvdeck@$(hostname)" -f ${key}`,
            'Generating an ed25519 key (an existing key is kept)...',
        ],
        [
            `sudo grep -qs '^github.com ' ${knownHosts} || sudo ssh-keyscan -t ed25519 github.com 2>/dev/null | sudo tee -a ${knownHosts} > /dev/null`,
            'Trusting the github.com host key...',
        ],
        [`sudo cat ${key}.pub`, 'Add this key at https://github.com/settings/keys'],
    ]);
}
