/**
 * @srvdeck/core — Service Control
 *
 * systemctl command plans for start/stop/restart/... and read-only
 * helpers that list the common services present on the host.
 */

import type { CommandRunner } from '../engine/command-runner.js';
import { SERVICE_ACTIONS, type ServiceAction } from '../engine/navigation.js';
import { ConfigurationError, ProviderError } from '../errors.js';
import { planOf, type CommandPlan } from './plan.js';

export interface ServiceUnit {
    readonly name: string;
    /** LoadState */
    readonly load: string;
    /** ActiveState */
    readonly active: string;
    /** SubState */
    readonly sub: string;
}

export const COMMON_SERVICES: readonly string[] = [
    // Web servers
    'apache2', 'httpd', 'nginx', 'caddy',
    // Databases
    'mysql', 'mysqld', 'mariadb', 'postgresql', 'redis', 'redis-server',
    // PHP
    'php8.4-fpm', 'php8.3-fpm', 'php-fpm',
    // System
    'sshd', 'ssh', 'firewalld', 'ufw', 'fail2ban',
    // Process management
    'supervisor', 'supervisord',
    'NetworkManager', 'systemd-resolved', 'chronyd',
    'docker', 'containerd', 'podman',
];

const SERVICE_NAME = /^[A-Za-z0-9@._-]+$/;

const ACTION_VERBS: Record<ServiceAction, string> = {
    start: 'Starting',
    stop: 'Stopping',
    restart: 'Restarting',
    reload: 'Reloading',
    enable: 'Enabling',
    disable: 'Disabling',
    status: 'Checking',
};

function isServiceAction(value: string): value is ServiceAction {
    return SERVICE_ACTIONS.some((action) => action === value);
}

export function assertServiceName(name: string): void {
    if (!SERVICE_NAME.test(name)) {
        throw new ConfigurationError(`invalid service name: ${name}`);
    }
}

// ─── Plans ────────────────────────────────────────────────────────

/** Every action but `status` is followed by `systemctl is-active`. */
export function controlService(name: string, action: string): CommandPlan {
    assertServiceName(name);
    const normalized = action.toLowerCase();
    if (!isServiceAction(normalized)) {
        throw new ConfigurationError(
            `unsupported service action: ${action}. Supported actions: ${SERVICE_ACTIONS.join(', ')}`,
        );
    }

    const label = `${name} ${normalized}`;
    if (normalized === 'status') {
        return planOf(label, [
            [`systemctl status ${name} --no-pager --lines=15`, `Checking ${name} service status...`],
        ]);
    }

    return planOf(label, [
        [`sudo systemctl ${normalized} ${name}`, `${ACTION_VERBS[normalized]} ${name} service...`],
        [`systemctl is-active ${name}`, `Verifying ${name} service state...`],
    ]);
}

// ─── Read-only Queries ────────────────────────────────────────────

/**
 * Parse `systemctl show --property=Id,LoadState,ActiveState,SubState`
 * output for several units. Only loaded units are returned.
 */
export function parseServiceShow(output: string): ServiceUnit[] {
    const units: ServiceUnit[] = [];
    for (const block of output.split(/\n\s*\n/)) {
        const fields = new Map<string, string>();
        for (const line of block.split('\n')) {
            const eq = line.indexOf('=');
            if (eq > 0) fields.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
        }
        const id = fields.get('Id');
        if (id === undefined || fields.get('LoadState') !== 'loaded') continue;
        units.push({
            name: id.replace(/\.service$/, ''),
            load: 'loaded',
            active: fields.get('ActiveState') ?? 'unknown',
            sub: fields.get('SubState') ?? 'unknown',
        });
    }
    return units;
}

export async function listSystemServices(
    runner: CommandRunner,
    names: readonly string[] = COMMON_SERVICES,
): Promise<ServiceUnit[]> {
    const result = await runner.run(
        `systemctl show ${names.join(' ')} --property=Id,LoadState,ActiveState,SubState --no-pager`,
    );
    if (result.error !== undefined && result.combinedOutput.trim() === '') {
        throw new ProviderError(`systemctl unavailable: ${result.error.message}`);
    }
    return parseServiceShow(result.combinedOutput);
}

/** `systemctl status` output lines. Inactive units exit non-zero but still print. */
export async function serviceDetails(runner: CommandRunner, name: string): Promise<string[]> {
    assertServiceName(name);
    const result = await runner.run(`systemctl status ${name} --no-pager --lines=15`);
    const lines = result.combinedOutput.split('\n').filter((line) => line.trim() !== '');
    if (lines.length === 0 && result.error !== undefined) {
        return [`❌ ${result.error.message}`];
    }
    return lines;
}
