/**
 * @srvdeck/tui — Key Translation
 *
 * Turns Ink's `useInput` callback arguments into the engine's KeyPress.
 */

import type { Key } from 'ink';
import type { KeyName, KeyPress } from '@srvdeck/core';

/** The flags of Ink's `Key` that the console reads */
export type InkKey = Pick<
    Key,
    | 'upArrow'
    | 'downArrow'
    | 'leftArrow'
    | 'rightArrow'
    | 'pageUp'
    | 'pageDown'
    | 'return'
    | 'escape'
    | 'tab'
    | 'backspace'
    | 'delete'
    | 'ctrl'
    | 'meta'
    | 'shift'
>;

/** Escape sequences Ink passes through as plain input */
const RAW_SEQUENCES = new Map<string, KeyName>([
    ['\u001b[H', 'home'],
    ['\u001b[1~', 'home'],
    ['\u001bOH', 'home'],
    ['\u001b[F', 'end'],
    ['\u001b[4~', 'end'],
    ['\u001bOF', 'end'],
]);

function namedKey(input: string, key: InkKey): KeyName | undefined {
    if (key.upArrow) return 'up';
    if (key.downArrow) return 'down';
    if (key.leftArrow) return 'left';
    if (key.rightArrow) return 'right';
    if (key.pageUp) return 'pageup';
    if (key.pageDown) return 'pagedown';
    if (key.return) return 'enter';
    if (key.escape) return 'escape';
    if (key.tab) return 'tab';
    // Most terminals send DEL for Backspace, which Ink reports as `delete`.
    if (key.backspace || key.delete) return 'backspace';
    return RAW_SEQUENCES.get(input);
}

export function toKeyPress(input: string, key: InkKey): KeyPress {
    const base = { input, ctrl: key.ctrl, meta: key.meta, shift: key.shift };
    const name = namedKey(input, key);
    return name === undefined ? base : { ...base, input: '', name };
}
