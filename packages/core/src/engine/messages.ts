/**
 * @srvdeck/core — Messages
 *
 * Everything that enters the Program's mailbox: key presses and resizes
 * from the terminal host, navigation requests from views, completions
 * from background work. Messages that carry a `target` belong to one
 * view even when another view is on screen.
 */

import type { Command } from './execution-queue.js';
import type { ExecutionResult } from './command-runner.js';
import type { NavigationPayload, NavigationState } from './navigation.js';
import type { MonitoringSnapshot } from '../monitoring/metrics-client.js';
import type { ServiceUnit } from '../providers/services.js';

// ─── Keys ─────────────────────────────────────────────────────────

export const KEY_NAMES = [
    'up',
    'down',
    'left',
    'right',
    'pageup',
    'pagedown',
    'home',
    'end',
    'enter',
    'escape',
    'tab',
    'backspace',
    'delete',
] as const;

export type KeyName = (typeof KEY_NAMES)[number];

export interface KeyPress {
    /** Set for non-printing keys */
    readonly name?: KeyName;
    /** Literal text; longer than one character for a paste */
    readonly input: string;
    readonly ctrl: boolean;
    readonly meta: boolean;
    readonly shift: boolean;
}

function isKeyName(value: string): value is KeyName {
    return KEY_NAMES.some((name) => name === value);
}

/**
 * Canonical label used by views to match bindings:
 * `ctrl+c`, `shift+tab`, `esc`, `up`, `space`, `k`, `G`.
 */
export function keyLabel(key: KeyPress): string {
    if (key.name !== undefined) {
        const base = key.name === 'escape' ? 'esc' : key.name;
        if (key.ctrl) return `ctrl+${base}`;
        if (key.shift && key.name === 'tab') return 'shift+tab';
        return base;
    }
    if (key.ctrl && key.input.length > 0) return `ctrl+${key.input.toLowerCase()}`;
    if (key.input === ' ') return 'space';
    return key.input;
}

/** True for multi-character input delivered in one event. */
export function isPaste(key: KeyPress): boolean {
    return key.name === undefined && !key.ctrl && key.input.length > 1;
}

/** Build a key message from a label as produced by `keyLabel`. */
export function keyMessage(label: string): KeyMessage {
    const plain = { input: '', ctrl: false, meta: false, shift: false };
    if (label === 'shift+tab') return { type: 'key', key: { ...plain, name: 'tab', shift: true } };
    if (label.startsWith('ctrl+') && label.length > 5) {
        const rest = label.slice(5);
        const name = rest === 'esc' ? 'escape' : rest;
        if (isKeyName(name)) return { type: 'key', key: { ...plain, name, ctrl: true } };
        return { type: 'key', key: { ...plain, input: rest, ctrl: true } };
    }
    if (label === 'esc') return { type: 'key', key: { ...plain, name: 'escape' } };
    if (label === 'space') return { type: 'key', key: { ...plain, input: ' ' } };
    if (isKeyName(label)) return { type: 'key', key: { ...plain, name: label } };
    return { type: 'key', key: { ...plain, input: label } };
}

// ─── Message Union ────────────────────────────────────────────────

export interface KeyMessage {
    readonly type: 'key';
    readonly key: KeyPress;
}

export interface CommandCompletedMessage {
    readonly type: 'command-completed';
    readonly result: ExecutionResult;
    readonly queueLabel: string;
    readonly runId: string;
    readonly description: string;
}

export interface EffectFailedMessage {
    readonly type: 'effect-failed';
    /** Label of the task that rejected */
    readonly label: string;
    readonly error: string;
    readonly target?: NavigationState;
}

/** Results of background loads, delivered to the view that asked for them. */
export type TargetedMessage =
    | { readonly type: 'log-lines-loaded'; readonly target: 'log-viewer'; readonly lines: readonly string[] }
    | { readonly type: 'services-loaded'; readonly target: 'service-list'; readonly services: readonly ServiceUnit[] }
    | {
          readonly type: 'service-details-loaded';
          readonly target: 'service-list';
          readonly name: string;
          readonly lines: readonly string[];
      }
    | { readonly type: 'monitor-tick'; readonly target: 'monitoring'; readonly generation: number }
    | {
          readonly type: 'monitoring-loaded';
          readonly target: 'monitoring';
          readonly generation: number;
          readonly snapshot: MonitoringSnapshot;
      }
    | {
          readonly type: 'report-loaded';
          readonly target: 'processing';
          readonly title: string;
          readonly lines: readonly string[];
      };

export type Message =
    | KeyMessage
    | { readonly type: 'quit' }
    | { readonly type: 'navigate'; readonly state: NavigationState; readonly payload?: NavigationPayload }
    | { readonly type: 'navigate-back' }
    | CommandCompletedMessage
    | { readonly type: 'queue-requested'; readonly label: string; readonly commands: readonly Command[] }
    | { readonly type: 'queue-start' }
    | { readonly type: 'spinner-tick'; readonly runId: string }
    | { readonly type: 'resize'; readonly width: number; readonly height: number }
    | { readonly type: 'service-status-loaded'; readonly status: Readonly<Record<string, boolean>> }
    | EffectFailedMessage
    | TargetedMessage;

// ─── Constructors ─────────────────────────────────────────────────

export function navigate(state: NavigationState, payload?: NavigationPayload): Message {
    return payload === undefined ? { type: 'navigate', state } : { type: 'navigate', state, payload };
}

export function navigateBack(): Message {
    return { type: 'navigate-back' };
}
