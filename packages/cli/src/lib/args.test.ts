import { describe, it, expect } from 'vitest';
import { flagValue, hasFlag, positionals } from './args.js';

describe('args', () => {
    const args = ['php', '--dry-run', '-n', '20', 'extra'];

    it('detects flags by any of their names', () => {
        expect(hasFlag(args, '--dry-run')).toBe(true);
        expect(hasFlag(args, '--clear', '-c')).toBe(false);
    });

    it('reads the value after a flag', () => {
        expect(flagValue(args, '-n', '--lines')).toBe('20');
        expect(flagValue(args, '--path')).toBeUndefined();
        expect(flagValue(['-n'], '-n')).toBeUndefined();
    });

    it('skips flags and their values when collecting positionals', () => {
        expect(positionals(args, ['-n'])).toEqual(['php', 'extra']);
        expect(positionals(args)).toEqual(['php', '20', 'extra']);
    });
});
