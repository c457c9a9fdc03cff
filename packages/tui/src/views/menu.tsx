/**
 * @srvdeck/tui — Menu View
 *
 * The landing screen. Sub-levels live on the view's own menu stack, so
 * moving between levels never touches the Navigator: `q`/`esc` in a
 * sub-level pops back to its parent, `q` at the main level quits.
 */

import React from 'react';
import { Box, Text } from 'ink';
import {
    BaseView,
    Effects,
    keyLabel,
    navigate,
    detectInstalledServices,
    type Effect,
    type MenuLevel,
    type Message,
    type NavigationPayload,
    type SharedContext,
} from '@srvdeck/core';
import { MENUS, type MenuItem } from './menus.js';

export class MenuView extends BaseView<React.ReactElement> {
    private currentLevel: MenuLevel = 'main';
    private readonly menuStack: MenuLevel[] = [];
    private cursorIndex = 0;

    constructor(private readonly context: SharedContext) {
        super();
    }

    get level(): MenuLevel {
        return this.currentLevel;
    }

    get cursor(): number {
        return this.cursorIndex;
    }

    get items(): readonly MenuItem[] {
        return MENUS[this.currentLevel].items;
    }

    override initialize(payload: NavigationPayload | undefined): void {
        if (payload?.kind !== 'menu-level') return;
        this.menuStack.length = 0;
        if (payload.level !== 'main') this.menuStack.push('main');
        this.currentLevel = payload.level;
        this.cursorIndex = 0;
    }

    /** Install flags are re-checked every time the menu comes back on screen. */
    override init(): Effect {
        return this.refreshStatus();
    }

    update(message: Message): Effect {
        if (message.type !== 'key') return Effects.none();

        switch (keyLabel(message.key)) {
            case 'q':
                return this.currentLevel === 'main' ? Effects.quit() : this.popLevel();
            case 'esc':
                return this.currentLevel === 'main' ? Effects.none() : this.popLevel();
            case 'up':
            case 'k':
                if (this.cursorIndex > 0) this.cursorIndex -= 1;
                return Effects.none();
            case 'down':
            case 'j':
                if (this.cursorIndex < this.items.length - 1) this.cursorIndex += 1;
                return Effects.none();
            case 'enter':
            case 'space':
                return this.select();
            case 'r':
            case 'R':
                return this.refreshStatus();
            default:
                return Effects.none();
        }
    }

    private select(): Effect {
        const item = this.items[this.cursorIndex];
        if (item === undefined) return Effects.none();

        const action = item.action;
        switch (action.kind) {
            case 'quit':
                return Effects.quit();
            case 'back':
                return this.popLevel();
            case 'level':
                this.menuStack.push(this.currentLevel);
                this.currentLevel = action.level;
                this.cursorIndex = 0;
                return Effects.clearScreen();
            case 'navigate':
                return Effects.message(navigate(action.state, action.payload));
        }
    }

    private popLevel(): Effect {
        this.currentLevel = this.menuStack.pop() ?? 'main';
        this.cursorIndex = 0;
        return Effects.clearScreen();
    }

    private refreshStatus(): Effect {
        const runner = this.context.runner;
        return Effects.task('install status', async () => ({
            type: 'service-status-loaded',
            status: await detectInstalledServices(runner),
        }));
    }

    // ─── Render ───────────────────────────────────────────────────

    private statusIcon(item: MenuItem): string {
        if (item.serviceKey === undefined) return '';
        const installed = this.context.serviceStatus[item.serviceKey];
        if (installed === undefined) return '';
        return installed ? '✅ ' : '⬜ ';
    }

    render(): React.ReactElement {
        const menu = MENUS[this.currentLevel];
        const help =
            this.currentLevel === 'main'
                ? 'Press q to quit, Enter to select, r to refresh.'
                : 'Press Enter to select, Esc to go back, r to refresh.';

        return (
            <Box flexDirection="column" borderStyle="round" borderColor="red" paddingX={1}>
                <Text bold color="red">{menu.title}</Text>
                <Text> </Text>
                {menu.items.map((item, i) => {
                    const selected = i === this.cursorIndex;
                    return (
                        <Text key={item.label}>
                            <Text color={selected ? 'yellow' : 'gray'}>{selected ? '> ' : '  '}</Text>
                            {this.statusIcon(item)}
                            <Text color={selected ? 'yellow' : 'white'} bold={selected}>{item.label}</Text>
                        </Text>
                    );
                })}
                <Text> </Text>
                <Text color="gray" dimColor>{help}</Text>
            </Box>
        );
    }
}
