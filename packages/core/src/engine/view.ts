/**
 * @srvdeck/core — View Contract
 *
 * A view is one screen. It is created once at startup and kept for the
 * whole session; `update` mutates it in place and returns the effect to
 * perform. `R` is whatever the terminal host renders (an Ink element in
 * the console, plain strings in tests).
 */

import { Effects, type Effect } from './effects.js';
import type { Message } from './messages.js';
import type { NavigationPayload, NavigationState } from './navigation.js';

export interface View<R> {
    /** Called every time the view becomes active, including after back-navigation */
    init(): Effect;
    update(message: Message): Effect;
    render(): R;
    /** Called by navigateTo only, before init() */
    initialize(payload: NavigationPayload | undefined): void;
}

export abstract class BaseView<R> implements View<R> {
    init(): Effect {
        return Effects.none();
    }

    abstract update(message: Message): Effect;

    abstract render(): R;

    initialize(_payload: NavigationPayload | undefined): void {
        // Views without navigation-time data keep their state.
    }
}

/** One live instance per screen. */
export type ViewRegistry<R> = { readonly [S in NavigationState]: View<R> };
