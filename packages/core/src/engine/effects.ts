/**
 * @srvdeck/core — Effects
 *
 * What a view or the controller asks the Program to do after a message
 * has been handled. Effects are plain data; only the Program performs
 * them, so update functions stay synchronous and testable.
 */

import type { Message } from './messages.js';
import type { NavigationState } from './navigation.js';

export type Effect =
    | { readonly kind: 'none' }
    | { readonly kind: 'message'; readonly message: Message }
    /** Background work. The resolved message (if any) is posted to the mailbox. */
    | {
          readonly kind: 'task';
          readonly label: string;
          /** View that receives an `effect-failed` if the task rejects */
          readonly target?: NavigationState;
          run(): Promise<Message | null>;
      }
    /** Post `message` once after `ms` milliseconds */
    | { readonly kind: 'tick'; readonly ms: number; readonly message: Message }
    | { readonly kind: 'batch'; readonly effects: readonly Effect[] }
    | { readonly kind: 'clear-screen' }
    | { readonly kind: 'quit' };

const NONE: Effect = { kind: 'none' };

export const Effects = {
    none(): Effect {
        return NONE;
    },

    message(message: Message): Effect {
        return { kind: 'message', message };
    },

    task(label: string, run: () => Promise<Message | null>, target?: NavigationState): Effect {
        return target === undefined ? { kind: 'task', label, run } : { kind: 'task', label, target, run };
    },

    tick(ms: number, message: Message): Effect {
        return { kind: 'tick', ms, message };
    },

    /** Combine effects, dropping `none`. Zero or one survivor is returned as-is. */
    batch(...effects: Effect[]): Effect {
        const kept = effects.filter((effect) => effect.kind !== 'none');
        if (kept.length === 0) return NONE;
        if (kept.length === 1 && kept[0] !== undefined) return kept[0];
        return { kind: 'batch', effects: kept };
    },

    clearScreen(): Effect {
        return { kind: 'clear-screen' };
    },

    quit(): Effect {
        return { kind: 'quit' };
    },
} as const;

/** Depth-first list of the leaf effects inside `effect`. */
export function flattenEffects(effect: Effect): Effect[] {
    if (effect.kind === 'none') return [];
    if (effect.kind === 'batch') return effect.effects.flatMap(flattenEffects);
    return [effect];
}
