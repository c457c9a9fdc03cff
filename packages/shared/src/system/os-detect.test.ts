import { describe, it, expect } from 'vitest';
import { detectOsFamily, resolveOsFamily, type OsHost } from './os-detect.js';
import { ConfigStore } from '../config/config-store.js';

function hostWith(files: Record<string, string>, platform: NodeJS.Platform = 'linux'): OsHost {
    return {
        platform,
        readFile: (path) => files[path] ?? null,
    };
}

describe('detectOsFamily', () => {
    it('recognises Ubuntu from lsb-release', () => {
        expect(detectOsFamily(hostWith({ '/etc/lsb-release': 'DISTRIB_ID=Ubuntu\n' }))).toBe('ubuntu');
    });

    it('recognises Fedora from fedora-release', () => {
        expect(detectOsFamily(hostWith({ '/etc/fedora-release': 'Fedora release 40' }))).toBe('fedora');
    });

    it('falls back to os-release', () => {
        expect(detectOsFamily(hostWith({ '/etc/os-release': 'NAME="Fedora Linux"' }))).toBe('fedora');
    });

    it('reports unknown for other distributions and platforms', () => {
        expect(detectOsFamily(hostWith({ '/etc/os-release': 'NAME="Arch Linux"' }))).toBe('unknown');
        expect(detectOsFamily(hostWith({ '/etc/lsb-release': 'Ubuntu' }, 'darwin'))).toBe('unknown');
    });
});

describe('resolveOsFamily', () => {
    it('prefers the configured override', () => {
        const config = { ...ConfigStore.defaults(), osFamily: 'fedora' as const };
        expect(resolveOsFamily(config, hostWith({ '/etc/lsb-release': 'Ubuntu' }))).toBe('fedora');
    });

    it('detects when set to auto', () => {
        expect(resolveOsFamily(ConfigStore.defaults(), hostWith({ '/etc/lsb-release': 'Ubuntu' }))).toBe('ubuntu');
    });
});
