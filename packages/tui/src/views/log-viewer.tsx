/**
 * @srvdeck/tui — Log Viewer
 *
 * Browses the command log. Lines are read in the background each time
 * the screen is entered; `f` opens a filter prompt whose text is matched
 * case-insensitively against every line.
 */

import React from 'react';
import { Box, Text } from 'ink';
import {
    BaseView,
    Effects,
    isPaste,
    keyLabel,
    navigateBack,
    type Effect,
    type KeyPress,
    type Message,
    type NavigationPayload,
    type SharedContext,
} from '@srvdeck/core';
import { logLineStyle } from '../components/line-style.js';
import { ScrollState } from './scroll.js';

export function filterLines(lines: readonly string[], filter: string): string[] {
    const needle = filter.trim().toLowerCase();
    if (needle === '') return [...lines];
    return lines.filter((line) => line.toLowerCase().includes(needle));
}

export class LogViewerView extends BaseView<React.ReactElement> {
    private allLines: readonly string[] = [];
    private activeFilter = '';
    private draft = '';
    private editing = false;
    private loading = false;
    private problem: string | undefined = undefined;
    private readonly scroll = new ScrollState(true);

    constructor(private readonly context: SharedContext) {
        super();
    }

    get filter(): string {
        return this.activeFilter;
    }

    get filterMode(): boolean {
        return this.editing;
    }

    get isLoading(): boolean {
        return this.loading;
    }

    get error(): string | undefined {
        return this.problem;
    }

    /** Lines after filtering */
    get lines(): string[] {
        return filterLines(this.allLines, this.activeFilter);
    }

    override initialize(payload: NavigationPayload | undefined): void {
        this.activeFilter = payload?.kind === 'log-filter' ? payload.filter : '';
        this.draft = '';
        this.editing = false;
    }

    override init(): Effect {
        return this.reload();
    }

    update(message: Message): Effect {
        switch (message.type) {
            case 'log-lines-loaded':
                this.allLines = message.lines;
                this.loading = false;
                this.problem = undefined;
                this.scroll.reset(true);
                return Effects.none();
            case 'effect-failed':
                this.loading = false;
                this.problem = message.error;
                return Effects.none();
            case 'key':
                return this.editing ? this.editFilter(message.key) : this.browse(keyLabel(message.key));
            default:
                return Effects.none();
        }
    }

    private reload(): Effect {
        this.loading = true;
        const log = this.context.commandLog;
        return Effects.task(
            'read command log',
            async () => ({ type: 'log-lines-loaded', target: 'log-viewer', lines: log.readLogLines() }),
            'log-viewer',
        );
    }

    private browse(label: string): Effect {
        if (this.scroll.handle(label, this.lines.length, this.context.viewableLines())) {
            return Effects.none();
        }
        switch (label) {
            case 'r':
                return this.reload();
            case 'f':
                this.editing = true;
                this.draft = this.activeFilter;
                return Effects.none();
            case 'c':
                this.activeFilter = '';
                this.scroll.reset(true);
                return Effects.none();
            case 'esc':
            case 'q':
                return Effects.message(navigateBack());
            default:
                return Effects.none();
        }
    }

    private editFilter(key: KeyPress): Effect {
        if (isPaste(key)) {
            this.draft += key.input.replace(/[\r\n\t]/g, '');
            return Effects.none();
        }
        switch (keyLabel(key)) {
            case 'enter':
                this.activeFilter = this.draft.trim();
                this.editing = false;
                this.scroll.reset(true);
                return Effects.none();
            case 'esc':
                this.editing = false;
                return Effects.none();
            case 'backspace':
            case 'delete':
                this.draft = this.draft.slice(0, -1);
                return Effects.none();
            case 'space':
                this.draft += ' ';
                return Effects.none();
            default:
                if (!key.ctrl && !key.meta && key.name === undefined && key.input.length === 1) {
                    this.draft += key.input;
                }
                return Effects.none();
        }
    }

    // ─── Render ───────────────────────────────────────────────────

    render(): React.ReactElement {
        const lines = this.lines;
        const height = this.context.viewableLines();
        const top = this.scroll.top(lines.length, height);
        const visible = lines.slice(top, top + height);

        return (
            <Box flexDirection="column" borderStyle="round" borderColor="blue" paddingX={1}>
                <Text bold color="blue">📜 Command Log</Text>
                <Text color="gray" dimColor>{this.context.commandLog.path}</Text>
                {this.activeFilter !== '' && <Text color="magenta">Filter: {this.activeFilter}</Text>}
                <Text> </Text>
                {this.loading && <Text color="yellow">⏳ Loading log...</Text>}
                {this.problem !== undefined && <Text color="red">❌ {this.problem}</Text>}
                {!this.loading && this.problem === undefined && lines.length === 0 && (
                    <Text color="gray">{this.activeFilter === '' ? 'No commands logged yet.' : 'No lines match the filter.'}</Text>
                )}
                {visible.map((line, i) => {
                    const style = logLineStyle(line);
                    return (
                        <Text key={top + i} color={style.color} bold={style.bold} dimColor={style.dim} wrap="truncate-end">
                            {line === '' ? ' ' : line}
                        </Text>
                    );
                })}
                {lines.length > height && (
                    <Text color="gray" dimColor>
                        Showing lines {top + 1}-{top + visible.length} of {lines.length}
                    </Text>
                )}
                <Text> </Text>
                {this.editing ? (
                    <Text>
                        <Text color="yellow">Filter: </Text>
                        {this.draft}
                        <Text color="gray">▊</Text>
                        <Text color="gray" dimColor>  (Enter apply, Esc cancel)</Text>
                    </Text>
                ) : (
                    <Text color="gray" dimColor>↑/↓ scroll · r reload · f filter · c clear filter · Esc back</Text>
                )}
            </Box>
        );
    }
}
