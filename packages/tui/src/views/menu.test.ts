import { describe, it, expect } from 'vitest';
import { keyMessage, navigate } from '@srvdeck/core';
import { MenuView } from './menu.js';
import { effectsOfKind, postedMessages, runTasks, testContext } from './test-context.js';

function press(view: MenuView, ...labels: string[]) {
    return labels.map((label) => view.update(keyMessage(label)));
}

describe('MenuView', () => {
    it('checks install status every time it becomes active', async () => {
        const { context, runner } = testContext({
            script: (invocation) => (invocation === 'git --version' ? { exitCode: 0 } : { exitCode: 127 }),
        });
        const view = new MenuView(context);

        const messages = await runTasks(view.init());

        expect(messages).toHaveLength(1);
        const [loaded] = messages;
        expect(loaded?.type).toBe('service-status-loaded');
        if (loaded?.type !== 'service-status-loaded') return;
        expect(loaded.status['git']).toBe(true);
        expect(loaded.status['php']).toBe(false);
        expect(Object.keys(loaded.status)).toEqual([
            'php',
            'composer',
            'python',
            'nodejs',
            'mysql',
            'caddy',
            'supervisor',
            'git',
        ]);
        expect(runner.invocations).toContain('php --version');
    });

    it('moves the cursor within bounds', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        press(view, 'up');
        expect(view.cursor).toBe(0);
        press(view, 'down', 'j', 'down');
        expect(view.cursor).toBe(3);
        press(view, 'k');
        expect(view.cursor).toBe(2);
        press(view, 'G', 'down', 'down', 'down', 'down', 'down', 'down');
        expect(view.cursor).toBe(view.items.length - 1);
    });

    it('opens sub-levels on its own stack and pops them with q and esc', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        const [opened] = press(view, 'enter');
        expect(view.level).toBe('core-services');
        expect(opened).toEqual({ kind: 'clear-screen' });

        press(view, 'q');
        expect(view.level).toBe('main');

        press(view, 'down', 'down', 'space');
        expect(view.level).toBe('server');
        press(view, 'esc');
        expect(view.level).toBe('main');
        expect(view.cursor).toBe(0);
    });

    it('quits with q at the main level and ignores esc there', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        expect(press(view, 'esc')).toEqual([{ kind: 'none' }]);
        expect(press(view, 'q')).toEqual([{ kind: 'quit' }]);
    });

    it('requests navigation for items that open a screen', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        press(view, 'enter');
        const [effect] = press(view, 'down', 'enter').slice(1);
        expect(effect === undefined ? [] : postedMessages(effect)).toEqual([
            navigate('processing', { kind: 'processing', action: { kind: 'install', service: 'composer' } }),
        ]);
    });

    it('opens the GitHub key action from the site stacks level', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        press(view, 'down', 'enter');
        const [effect] = press(view, 'down', 'down', 'down', 'down', 'down', 'enter').slice(5);
        expect(effect === undefined ? [] : postedMessages(effect)).toEqual([
            navigate('processing', { kind: 'processing', action: { kind: 'github-key' } }),
        ]);
    });

    it('returns to main from the Back item', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        press(view, 'down', 'enter');
        expect(view.level).toBe('site-stacks');
        press(view, 'down', 'down', 'down', 'down', 'down', 'down', 'enter');
        expect(view.level).toBe('main');
    });

    it('initializes to the level named in the payload', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        view.initialize({ kind: 'menu-level', level: 'security' });
        expect(view.level).toBe('security');
        press(view, 'q');
        expect(view.level).toBe('main');
    });

    it('refreshes install status with r', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        const [effect] = press(view, 'r');
        expect(effect === undefined ? [] : effectsOfKind(effect, 'task').map((task) => task.label)).toEqual([
            'install status',
        ]);
    });

    it('exits from the Exit item', () => {
        const { context } = testContext();
        const view = new MenuView(context);

        const effects = press(view, 'end', 'G');
        expect(effects).toEqual([{ kind: 'none' }, { kind: 'none' }]);
        for (let i = 0; i < view.items.length; i++) press(view, 'down');
        expect(press(view, 'enter')).toEqual([{ kind: 'quit' }]);
    });
});
