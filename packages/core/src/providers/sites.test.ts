import { describe, it, expect } from 'vitest';
import {
    laravelCaddyfile,
    nextjsCaddyfile,
    planGithubSshKey,
    planLaravelQueueWorker,
    planLaravelSite,
    planLaravelUpdate,
    planNextjsSite,
    planNextjsUpdate,
    pm2Ecosystem,
    supervisorProgram,
    webUser,
} from './sites.js';
import { ConfigurationError, ProviderError } from '../errors.js';

describe('webUser', () => {
    it('follows the distribution', () => {
        expect(webUser('ubuntu')).toBe('www-data');
        expect(webUser('fedora')).toBe('apache');
    });
});

describe('planLaravelSite', () => {
    it('creates a fresh Laravel app when no repository is given', () => {
        const plan = planLaravelSite({ siteName: 'shop', domain: 'shop.example.com' }, 'ubuntu');
        const invocations = plan.commands.map((c) => c.invocation);

        expect(plan.label).toBe('Laravel site shop.example.com');
        expect(invocations).toHaveLength(13);
        expect(invocations[0]).toBe('sudo mkdir -p /var/www');
        expect(invocations[1]).toBe('sudo composer create-project --no-interaction laravel/laravel /var/www/shop');
        expect(invocations[4]).toBe('sudo chown -R www-data:www-data /var/www/shop');
        expect(invocations[7]).toBe('sudo systemctl enable --now php8.4-fpm');
        expect(invocations[9]).toBe(
            `sudo tee /etc/caddy/sites/shop.example.com.caddy > /dev/null <<'SRVDECK_EOF'\n${laravelCaddyfile('shop.example.com', '/var/www/shop', 'ubuntu')}\nSRVDECK_EOF`,
        );
        expect(invocations[12]).toBe('sudo systemctl reload caddy || sudo systemctl restart caddy');
    });

    it('clones the repository on the requested branch', () => {
        const plan = planLaravelSite(
            { siteName: 'shop', domain: 'shop.example.com', gitRepo: 'https://github.com/acme/shop.git', branch: 'develop' },
            'fedora',
        );
        expect(plan.commands[1]).toEqual({
            invocation: 'sudo git clone -b develop https://github.com/acme/shop.git /var/www/shop',
            description: 'Cloning Laravel app from https://github.com/acme/shop.git (branch: develop)...',
        });
        expect(plan.commands[4]?.invocation).toBe('sudo chown -R apache:apache /var/www/shop');
        expect(plan.commands[7]?.invocation).toBe('sudo systemctl enable --now php-fpm');
    });

    it('treats blank optional fields as absent', () => {
        const plan = planLaravelSite({ siteName: 'shop', domain: 'shop.example.com', gitRepo: '', branch: '' }, 'ubuntu');
        expect(plan.commands[1]?.invocation).toContain('composer create-project');
    });

    it('reports the first validation problem', () => {
        expect(() => planLaravelSite({ siteName: 'a', domain: 'shop.example.com' }, 'ubuntu')).toThrow(
            'site name must be at least 2 characters',
        );
        expect(() => planLaravelSite({ siteName: 'shop', domain: 'localhost' }, 'ubuntu')).toThrow(
            'domain must contain at least one dot',
        );
        expect(() =>
            planLaravelSite({ siteName: 'shop', domain: 'shop.example.com', gitRepo: 'ftp://example.com/shop.git' }, 'ubuntu'),
        ).toThrow(ConfigurationError);
    });

    it('needs a known OS', () => {
        expect(() => planLaravelSite({ siteName: 'shop', domain: 'shop.example.com' }, 'unknown')).toThrow(ProviderError);
    });
});

describe('laravelCaddyfile', () => {
    it('points php_fastcgi at the distribution socket', () => {
        const ubuntu = laravelCaddyfile('shop.example.com', '/var/www/shop', 'ubuntu').split('\n');
        expect(ubuntu.slice(0, 3)).toEqual([
            'shop.example.com {',
            '    root * /var/www/shop/public',
            '    php_fastcgi unix//run/php/php8.4-fpm.sock',
        ]);
        expect(laravelCaddyfile('shop.example.com', '/var/www/shop', 'fedora')).toContain(
            '    php_fastcgi unix//run/php-fpm/www.sock',
        );
    });
});

describe('planNextjsSite', () => {
    it('builds and starts a cloned app under PM2', () => {
        const plan = planNextjsSite(
            { siteName: 'web', domain: 'web.example.com', gitRepo: 'https://github.com/acme/web.git' },
            'ubuntu',
        );
        const invocations = plan.commands.map((c) => c.invocation);

        expect(plan.label).toBe('Next.js site web.example.com');
        expect(invocations).toHaveLength(14);
        expect(invocations.slice(1, 6)).toEqual([
            'sudo git clone https://github.com/acme/web.git /var/www/web',
            'sudo chown -R www-data:www-data /var/www/web',
            'cd /var/www/web && sudo -u www-data npm install',
            'cd /var/www/web && sudo -u www-data npm run build',
            'sudo mkdir -p /etc/pm2 /var/log/pm2',
        ]);
        expect(invocations[7]).toBe('sudo pm2 start /etc/pm2/ecosystem.web.json');
        expect(invocations[8]).toBe('sudo pm2 save');
    });

    it('scaffolds with the chosen package manager', () => {
        const plan = planNextjsSite({ siteName: 'web', domain: 'web.example.com', packageManager: 'pnpm' }, 'fedora');
        expect(plan.commands[1]?.invocation).toBe(
            'sudo npx --yes create-next-app@latest /var/www/web --typescript --eslint --app --use-pnpm',
        );
        expect(plan.commands[3]?.invocation).toBe('cd /var/www/web && sudo -u apache pnpm install');
    });

    it('rejects a privileged port', () => {
        expect(() => planNextjsSite({ siteName: 'web', domain: 'web.example.com', port: 80 }, 'ubuntu')).toThrow(
            'port must be between 1024 and 65535',
        );
    });
});

describe('pm2Ecosystem', () => {
    it('describes one app listening on the port', () => {
        const parsed: unknown = JSON.parse(pm2Ecosystem('web', '/var/www/web', 3100));
        expect(parsed).toMatchObject({
            apps: [
                {
                    name: 'web',
                    script: '/var/www/web/node_modules/.bin/next',
                    args: 'start -p 3100',
                    cwd: '/var/www/web',
                    env: { NODE_ENV: 'production', PORT: '3100' },
                },
            ],
        });
    });
});

describe('nextjsCaddyfile', () => {
    it('reverse proxies to the app port', () => {
        expect(nextjsCaddyfile('web.example.com', 3100).split('\n').slice(0, 3)).toEqual([
            'web.example.com {',
            '    reverse_proxy localhost:3100',
            '    encode gzip',
        ]);
    });
});

describe('planLaravelUpdate', () => {
    it('pulls the current branch between maintenance mode on and off', () => {
        const plan = planLaravelUpdate({ siteName: 'shop' }, 'ubuntu');

        expect(plan.label).toBe('Update Laravel site shop');
        expect(plan.commands.map((c) => c.invocation)).toEqual([
            'sudo test -d /var/www/shop/.git',
            'cd /var/www/shop && sudo php artisan down',
            'cd /var/www/shop && sudo git -c safe.directory=/var/www/shop pull --ff-only',
            'cd /var/www/shop && sudo composer install --no-dev --optimize-autoloader --no-interaction',
            'cd /var/www/shop && sudo php artisan migrate --force',
            'cd /var/www/shop && sudo php artisan cache:clear',
            'cd /var/www/shop && sudo php artisan config:clear',
            'cd /var/www/shop && sudo php artisan view:clear',
            'sudo chown -R www-data:www-data /var/www/shop',
            'sudo find /var/www/shop -type d -exec chmod 755 {} + && sudo find /var/www/shop -type f -exec chmod 644 {} +',
            'sudo chmod -R 775 /var/www/shop/storage /var/www/shop/bootstrap/cache',
            'cd /var/www/shop && sudo php artisan up',
        ]);
    });

    it('switches branch before pulling when one is given', () => {
        const plan = planLaravelUpdate({ siteName: 'shop', branch: 'develop' }, 'fedora');

        expect(plan.commands[2]).toEqual({
            invocation:
                'cd /var/www/shop && sudo git -c safe.directory=/var/www/shop fetch origin && sudo git -c safe.directory=/var/www/shop checkout develop && sudo git -c safe.directory=/var/www/shop pull --ff-only origin develop',
            description: 'Switching to branch develop and pulling latest changes...',
        });
        expect(plan.commands[8]?.invocation).toBe('sudo chown -R apache:apache /var/www/shop');
    });

    it('validates the site and branch', () => {
        expect(planLaravelUpdate({ siteName: 'shop', branch: '' }, 'ubuntu').commands[2]?.invocation).toContain(
            'pull --ff-only',
        );
        expect(() => planLaravelUpdate({ siteName: 'shop', branch: 'bad branch' }, 'ubuntu')).toThrow(
            'branch name contains invalid characters',
        );
        expect(() => planLaravelUpdate({ siteName: 'shop' }, 'unknown')).toThrow(ProviderError);
    });
});

describe('planLaravelQueueWorker', () => {
    it('writes a Supervisor program and starts it', () => {
        const plan = planLaravelQueueWorker({ siteName: 'shop' }, 'ubuntu');
        const program = supervisorProgram(
            { siteName: 'shop', connection: 'database', queue: 'default', processes: 1 },
            '/var/www/shop',
            'www-data',
        );

        expect(plan.label).toBe('Queue worker for shop');
        expect(plan.commands.map((c) => c.invocation)).toEqual([
            'sudo test -f /var/www/shop/artisan',
            'sudo mkdir -p /var/www/shop/storage/logs',
            'sudo chown -R www-data:www-data /var/www/shop/storage/logs',
            `sudo tee /etc/supervisor/conf.d/laravel-worker-shop.conf > /dev/null <<'SRVDECK_EOF'\n${program}\nSRVDECK_EOF`,
            'sudo systemctl enable --now supervisor',
            'sudo supervisorctl reread',
            'sudo supervisorctl update',
            "sudo supervisorctl start 'laravel-worker-shop:*'",
        ]);
        expect(program.split('\n')).toContain(
            'command=php /var/www/shop/artisan queue:work database --sleep=3 --tries=3 --max-time=3600 --queue=default',
        );
    });

    it('uses supervisord paths on Fedora', () => {
        const plan = planLaravelQueueWorker(
            { siteName: 'shop', connection: 'redis', queue: 'high,default', processes: 4 },
            'fedora',
        );
        const program = plan.commands[3]?.invocation ?? '';

        expect(program.startsWith('sudo tee /etc/supervisord.d/laravel-worker-shop.ini')).toBe(true);
        expect(program.split('\n')).toEqual(
            expect.arrayContaining([
                'command=php /var/www/shop/artisan queue:work redis --sleep=3 --tries=3 --max-time=3600 --queue=high,default',
                'user=apache',
                'numprocs=4',
            ]),
        );
        expect(plan.commands[4]?.invocation).toBe('sudo systemctl enable --now supervisord');
        expect(plan.commands[7]?.description).toBe('Starting 4 queue worker process(es)...');
    });

    it('rejects bad worker settings', () => {
        expect(() => planLaravelQueueWorker({ siteName: 'shop', processes: 0 }, 'ubuntu')).toThrow(
            'processes must be between 1 and 16',
        );
        expect(() => planLaravelQueueWorker({ siteName: 'shop', queue: 'high default' }, 'ubuntu')).toThrow(
            ConfigurationError,
        );
    });
});

describe('planNextjsUpdate', () => {
    it('pulls, rebuilds and restarts the PM2 process', () => {
        const plan = planNextjsUpdate({ siteName: 'web', packageManager: 'pnpm' }, 'ubuntu');

        expect(plan.label).toBe('Update Next.js site web');
        expect(plan.commands.map((c) => c.invocation)).toEqual([
            'sudo test -d /var/www/web/.git',
            'cd /var/www/web && sudo git -c safe.directory=/var/www/web pull --ff-only',
            'sudo chown -R www-data:www-data /var/www/web',
            'cd /var/www/web && sudo -u www-data pnpm install',
            'cd /var/www/web && sudo -u www-data pnpm run build',
            'sudo pm2 restart web',
            'sudo pm2 save',
        ]);
    });
});

describe('planGithubSshKey', () => {
    it('keeps an existing key and prints the public half', () => {
        const plan = planGithubSshKey();

        expect(plan.label).toBe('GitHub SSH key');
        expect(plan.commands).toHaveLength(4);
        expect(plan.commands[1]?.invocation).toBe(
            `sudo test -f /root/.ssh/id_ed25519 || sudo ssh-keygen -t ed25519 -N '' -C "srvdeck@$(hostname)" -f /root/.ssh/id_ed25519`,
        );
        expect(plan.commands[3]?.invocation).toBe('sudo cat /root/.ssh/id_ed25519.pub');
    });
});
