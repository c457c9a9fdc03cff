/**
 * @srvdeck/cli — Argument Helpers
 *
 * Just enough flag parsing for the handful of commands the CLI has.
 */

export function hasFlag(args: readonly string[], ...names: string[]): boolean {
    return args.some((arg) => names.includes(arg));
}

/** Value following the first of `names`, e.g. `-n 50`. */
export function flagValue(args: readonly string[], ...names: string[]): string | undefined {
    const index = args.findIndex((arg) => names.includes(arg));
    if (index < 0) return undefined;
    return args[index + 1];
}

/** Arguments that are neither flags nor flag values. */
export function positionals(args: readonly string[], valueFlags: readonly string[] = []): string[] {
    const result: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? '';
        if (valueFlags.includes(arg)) {
            i += 1;
            continue;
        }
        if (!arg.startsWith('-')) result.push(arg);
    }
    return result;
}
