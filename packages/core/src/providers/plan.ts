/**
 * @srvdeck/core — Command Plans
 *
 * What every provider returns: a label for the Processing screen and the
 * ordered commands to run. Providers are pure; they never execute
 * anything themselves.
 */

import type { Command } from '../engine/execution-queue.js';

export interface CommandPlan {
    readonly label: string;
    readonly commands: readonly Command[];
}

/** Build a plan from `[invocation, description]` pairs. */
export function planOf(label: string, steps: ReadonlyArray<readonly [string, string]>): CommandPlan {
    return {
        label,
        commands: steps.map(([invocation, description]) => ({ invocation, description })),
    };
}

/** Single-quote a value for `sh -c`. */
export function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}
