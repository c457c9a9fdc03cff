/**
 * @srvdeck/core — Recording Views
 *
 * Minimal views that remember what the engine did to them. Used to drive
 * the controller and navigator without a terminal. Test-only; left out of
 * the build.
 */

import { Effects, type Effect } from './effects.js';
import type { Message } from './messages.js';
import type { NavigationPayload, NavigationState } from './navigation.js';
import { BaseView } from './view.js';

export class RecordingView extends BaseView<string> {
    readonly payloads: Array<NavigationPayload | undefined> = [];
    readonly messages: Message[] = [];
    inits = 0;
    /** Effect returned from init(); defaults to none */
    onInit: () => Effect = () => Effects.none();
    /** Effect returned from update(); defaults to none */
    onUpdate: (message: Message) => Effect = () => Effects.none();

    constructor(readonly name: NavigationState) {
        super();
    }

    override init(): Effect {
        this.inits++;
        return this.onInit();
    }

    update(message: Message): Effect {
        this.messages.push(message);
        return this.onUpdate(message);
    }

    render(): string {
        return this.name;
    }

    override initialize(payload: NavigationPayload | undefined): void {
        this.payloads.push(payload);
    }
}

export type RecordingRegistry = { readonly [S in NavigationState]: RecordingView };

export function recordingViews(): RecordingRegistry {
    return {
        menu: new RecordingView('menu'),
        processing: new RecordingView('processing'),
        'service-list': new RecordingView('service-list'),
        'log-viewer': new RecordingView('log-viewer'),
        monitoring: new RecordingView('monitoring'),
        settings: new RecordingView('settings'),
        'mysql-backup-form': new RecordingView('mysql-backup-form'),
        'security-form': new RecordingView('security-form'),
        'laravel-site-form': new RecordingView('laravel-site-form'),
        'nextjs-site-form': new RecordingView('nextjs-site-form'),
        'laravel-update-form': new RecordingView('laravel-update-form'),
        'laravel-queue-form': new RecordingView('laravel-queue-form'),
        'nextjs-update-form': new RecordingView('nextjs-update-form'),
    };
}
