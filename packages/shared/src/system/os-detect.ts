/**
 * @srvdeck/shared — OS Family Detection
 *
 * Install recipes differ between Debian-style (apt) and Fedora-style (dnf)
 * hosts. Detection reads the usual release files; a configured override wins.
 */

import { existsSync, readFileSync } from 'node:fs';
import type { AppConfig } from '../config/config-store.js';

export type OsFamily = 'ubuntu' | 'fedora' | 'unknown';

/** File access used by detection, replaceable in tests. */
export interface OsHost {
    readonly platform: NodeJS.Platform;
    readFile(path: string): string | null;
}

const localHost: OsHost = {
    platform: process.platform,
    readFile(path: string): string | null {
        if (!existsSync(path)) return null;
        try {
            return readFileSync(path, 'utf-8');
        } catch {
            // Unreadable release files count as absent
            return null;
        }
    },
};

export function detectOsFamily(host: OsHost = localHost): OsFamily {
    if (host.platform !== 'linux') return 'unknown';

    if (host.readFile('/etc/lsb-release')?.includes('Ubuntu')) return 'ubuntu';
    if (host.readFile('/etc/fedora-release') !== null) return 'fedora';

    const osRelease = host.readFile('/etc/os-release');
    if (osRelease?.includes('Ubuntu')) return 'ubuntu';
    if (osRelease?.includes('Fedora')) return 'fedora';

    return 'unknown';
}

export function resolveOsFamily(config: AppConfig, host: OsHost = localHost): OsFamily {
    return config.osFamily === 'auto' ? detectOsFamily(host) : config.osFamily;
}
