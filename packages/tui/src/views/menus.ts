/**
 * @srvdeck/tui — Menu Levels
 *
 * Titles and items of every menu level. Items carrying a `serviceKey`
 * show the install status icon for that service.
 */

import type { MenuLevel, NavigationPayload, NavigationState } from '@srvdeck/core';

export type MenuAction =
    | { readonly kind: 'navigate'; readonly state: NavigationState; readonly payload?: NavigationPayload }
    | { readonly kind: 'level'; readonly level: MenuLevel }
    | { readonly kind: 'back' }
    | { readonly kind: 'quit' };

export interface MenuItem {
    readonly label: string;
    readonly action: MenuAction;
    readonly serviceKey?: string;
}

export interface MenuDefinition {
    readonly title: string;
    readonly items: readonly MenuItem[];
}

const BACK: MenuItem = { label: '← Back to Main Menu', action: { kind: 'back' } };

function install(label: string, service: string): MenuItem {
    return {
        label,
        serviceKey: service,
        action: { kind: 'navigate', state: 'processing', payload: { kind: 'processing', action: { kind: 'install', service } } },
    };
}

function run(label: string, state: NavigationState, payload?: NavigationPayload): MenuItem {
    return payload === undefined
        ? { label, action: { kind: 'navigate', state } }
        : { label, action: { kind: 'navigate', state, payload } };
}

export const MENUS: { readonly [L in MenuLevel]: MenuDefinition } = {
    main: {
        title: '🔧 srvdeck: server setup for PHP and Node.js apps',
        items: [
            { label: 'Core Services (PHP, Node, Caddy, etc.)', action: { kind: 'level', level: 'core-services' } },
            { label: 'Site Stacks (Laravel, Next.js)', action: { kind: 'level', level: 'site-stacks' } },
            { label: 'Server Management', action: { kind: 'level', level: 'server' } },
            { label: 'Security', action: { kind: 'level', level: 'security' } },
            run('Monitoring Dashboard', 'monitoring'),
            run('Settings', 'settings'),
            { label: 'Exit', action: { kind: 'quit' } },
        ],
    },
    'core-services': {
        title: '🔧 Core Services',
        items: [
            install('Install PHP 8.4', 'php'),
            install('Install PHP Composer', 'composer'),
            install('Install Python, pip, and virtualenv', 'python'),
            install('Install Node.js, npm and PM2', 'nodejs'),
            install('Install MySQL', 'mysql'),
            install('Install Caddy Server (recommended)', 'caddy'),
            install('Install Supervisor (recommended)', 'supervisor'),
            install('Install Git CLI (recommended)', 'git'),
            BACK,
        ],
    },
    'site-stacks': {
        title: '🚀 Site Stacks',
        items: [
            run('Create a new Laravel Site', 'laravel-site-form'),
            run('Update Laravel Site', 'laravel-update-form'),
            run('Setup Laravel Queue Worker', 'laravel-queue-form'),
            run('Create a new Next.js Site', 'nextjs-site-form'),
            run('Update Next.js Site', 'nextjs-update-form'),
            run('GitHub Authentication (SSH key)', 'processing', { kind: 'processing', action: { kind: 'github-key' } }),
            BACK,
        ],
    },
    server: {
        title: '⚙️ Server Management',
        items: [
            run('Backup MySQL Database', 'mysql-backup-form'),
            run('System Status', 'processing', { kind: 'processing', action: { kind: 'system-status' } }),
            run('Service Status', 'processing', { kind: 'processing', action: { kind: 'service-status' } }),
            run('Service Management', 'service-list'),
            run('View Command Logs', 'log-viewer'),
            run('Monitoring Dashboard', 'monitoring'),
            BACK,
        ],
    },
    security: {
        title: '🛡️ Security',
        items: [
            run('Harden this Server', 'security-form'),
            run('Security Assessment', 'processing', { kind: 'processing', action: { kind: 'security-assessment' } }),
            BACK,
        ],
    },
};
