/**
 * @srvdeck/core — System Status Reports
 *
 * Read-only checks rendered as report lines for the Processing screen.
 * Checks run concurrently; a check that fails simply leaves its line out
 * (or reports "Not installed" for version checks).
 */

import type { CommandRunner, ExecutionResult } from '../engine/command-runner.js';

export const KEY_SERVICES: readonly string[] = ['mysql', 'mysqld', 'caddy', 'nginx', 'php-fpm', 'supervisor'];

const SOFTWARE_VERSIONS: ReadonlyArray<readonly [string, string]> = [
    ['PHP', 'php --version'],
    ['Node.js', 'node --version'],
    ['Git', 'git --version'],
    ['Composer', 'composer --version'],
    ['Python', 'python3 --version'],
];

const MAX_VERSION_LENGTH = 60;

function firstLine(output: string): string {
    return (output.split('\n')[0] ?? '').trim();
}

/** Second line of tabular output (the row under the header), or null. */
function secondLine(result: ExecutionResult): string | null {
    if (result.error) return null;
    const row = result.combinedOutput.split('\n')[1];
    return row !== undefined && row.trim() !== '' ? row.trim() : null;
}

function truncate(value: string, max: number): string {
    return value.length > max ? `${value.slice(0, max)}...` : value;
}

/** `systemctl is-active` prints the state even when it exits non-zero. */
export function serviceStateLine(service: string, result: ExecutionResult): string | null {
    const state = firstLine(result.combinedOutput);
    if (state === '' || state.includes(' ')) return null;
    const icon = state === 'active' ? '🟢' : '🔴';
    return `${icon} ${service}: ${state}`;
}

async function serviceLines(runner: CommandRunner, services: readonly string[]): Promise<string[]> {
    const results = await Promise.all(services.map((service) => runner.run(`systemctl is-active ${service}`)));
    return results.flatMap((result, i) => {
        const line = serviceStateLine(services[i] ?? '', result);
        return line === null ? [] : [line];
    });
}

// ─── Reports ──────────────────────────────────────────────────────

export async function collectSystemStatus(runner: CommandRunner): Promise<string[]> {
    const [uname, uptime, disk, memory] = await Promise.all([
        runner.run('uname -a'),
        runner.run('uptime'),
        runner.run('df -h /'),
        runner.run('free -h'),
    ]);

    const report = ['=== SYSTEM STATUS REPORT ===', '', '📊 System Information:'];
    if (!uname.error) report.push(`System: ${firstLine(uname.combinedOutput)}`);
    if (!uptime.error) report.push(`Uptime: ${firstLine(uptime.combinedOutput)}`);
    const diskRow = secondLine(disk);
    if (diskRow !== null) report.push(`Disk Usage: ${diskRow}`);
    const memoryRow = secondLine(memory);
    if (memoryRow !== null) report.push(`Memory: ${memoryRow}`);

    report.push('', '🔧 Service Status:', ...(await serviceLines(runner, KEY_SERVICES)));

    report.push('', '💻 Software Versions:');
    const versions = await Promise.all(SOFTWARE_VERSIONS.map(([, check]) => runner.run(check)));
    versions.forEach((result, i) => {
        const name = SOFTWARE_VERSIONS[i]?.[0] ?? '';
        report.push(
            result.error
                ? `❌ ${name}: Not installed`
                : `✅ ${name}: ${truncate(firstLine(result.combinedOutput), MAX_VERSION_LENGTH)}`,
        );
    });

    return report;
}

export async function collectServiceStatus(
    runner: CommandRunner,
    services: readonly string[] = KEY_SERVICES,
): Promise<string[]> {
    const lines = await serviceLines(runner, services);
    return ['=== SERVICE STATUS ===', '', ...(lines.length > 0 ? lines : ['No known services found'])];
}
