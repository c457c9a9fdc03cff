/**
 * @srvdeck/core — Navigation
 *
 * The closed set of screens, the payloads that can be handed to a screen
 * when it becomes active, and the Navigator: a LIFO history of screens.
 *
 * navigateTo pushes the current screen, calls `initialize(payload)` on
 * the target and then its `init()`. navigateBack pops and calls only
 * `init()`, so whatever the earlier visit left in the view survives.
 */

import { Effects, type Effect } from './effects.js';
import type { ViewRegistry } from './view.js';

// ─── States & Payloads ────────────────────────────────────────────

export const NAVIGATION_STATES = [
    'menu',
    'processing',
    'service-list',
    'log-viewer',
    'monitoring',
    'settings',
    'mysql-backup-form',
    'security-form',
    'laravel-site-form',
    'nextjs-site-form',
    'laravel-update-form',
    'laravel-queue-form',
    'nextjs-update-form',
] as const;

export type NavigationState = (typeof NAVIGATION_STATES)[number];

export type FormState = Extract<
    NavigationState,
    | 'mysql-backup-form'
    | 'security-form'
    | 'laravel-site-form'
    | 'nextjs-site-form'
    | 'laravel-update-form'
    | 'laravel-queue-form'
    | 'nextjs-update-form'
>;

export const MENU_LEVELS = ['main', 'core-services', 'site-stacks', 'server', 'security'] as const;
export type MenuLevel = (typeof MENU_LEVELS)[number];

export const SERVICE_ACTIONS = ['start', 'stop', 'restart', 'reload', 'enable', 'disable', 'status'] as const;
export type ServiceAction = (typeof SERVICE_ACTIONS)[number];

/** What the Processing screen should do when it is entered. */
export type ProcessingAction =
    | { readonly kind: 'install'; readonly service: string }
    | { readonly kind: 'service-control'; readonly service: string; readonly action: ServiceAction }
    | { readonly kind: 'service-status' }
    | { readonly kind: 'system-status' }
    | { readonly kind: 'security-assessment' }
    | { readonly kind: 'github-key' }
    /** Show whatever is already loaded in the shared queue */
    | { readonly kind: 'run-queue' }
    | { readonly kind: 'report'; readonly title: string; readonly lines: readonly string[] };

export type NavigationPayload =
    | { readonly kind: 'menu-level'; readonly level: MenuLevel }
    | { readonly kind: 'processing'; readonly action: ProcessingAction }
    | { readonly kind: 'log-filter'; readonly filter: string };

// ─── Navigator ────────────────────────────────────────────────────

export class Navigator<R> {
    private readonly stack: NavigationState[] = [];
    private currentState: NavigationState;

    constructor(
        private readonly views: ViewRegistry<R>,
        initial: NavigationState = 'menu',
    ) {
        this.currentState = initial;
    }

    get current(): NavigationState {
        return this.currentState;
    }

    /** Screens that `navigateBack` would return to, oldest first */
    get history(): readonly NavigationState[] {
        return this.stack;
    }

    navigateTo(state: NavigationState, payload?: NavigationPayload): Effect {
        this.stack.push(this.currentState);
        this.currentState = state;
        const view = this.views[state];
        view.initialize(payload);
        return Effects.batch(Effects.clearScreen(), view.init());
    }

    /** No-op on an empty history. */
    navigateBack(): Effect {
        const previous = this.stack.pop();
        if (previous === undefined) return Effects.none();
        this.currentState = previous;
        return Effects.batch(Effects.clearScreen(), this.views[previous].init());
    }
}
