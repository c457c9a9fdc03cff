/**
 * @srvdeck/tui — View Registry
 *
 * One live view per screen, created once per session.
 */

import type React from 'react';
import type { SharedContext, ViewRegistry } from '@srvdeck/core';
import { FormView } from './form.js';
import { LogViewerView } from './log-viewer.js';
import { MenuView } from './menu.js';
import { MonitoringView } from './monitoring.js';
import { ProcessingView } from './processing.js';
import { ServiceListView } from './service-list.js';
import { SettingsView, type SettingsStore } from './settings.js';

export interface ViewOptions {
    /** Clock for form plans (backup file names, sshd_config backups) */
    readonly now?: () => Date;
    readonly settingsStore?: SettingsStore;
}

export function createViews(context: SharedContext, options: ViewOptions = {}): ViewRegistry<React.ReactElement> {
    return {
        menu: new MenuView(context),
        processing: new ProcessingView(context),
        'service-list': new ServiceListView(context),
        'log-viewer': new LogViewerView(context),
        monitoring: new MonitoringView(context),
        settings: new SettingsView(context, options.settingsStore),
        'mysql-backup-form': new FormView('mysql-backup-form', context, options.now),
        'security-form': new FormView('security-form', context, options.now),
        'laravel-site-form': new FormView('laravel-site-form', context, options.now),
        'nextjs-site-form': new FormView('nextjs-site-form', context, options.now),
        'laravel-update-form': new FormView('laravel-update-form', context, options.now),
        'laravel-queue-form': new FormView('laravel-queue-form', context, options.now),
        'nextjs-update-form': new FormView('nextjs-update-form', context, options.now),
    };
}
