/**
 * @srvdeck/tui — Service List
 *
 * Common systemd units present on the host with their state. Control
 * actions hand over to the Processing screen; `enter` shows the unit's
 * `systemctl status` inline.
 */

import React from 'react';
import { Box, Text } from 'ink';
import {
    BaseView,
    Effects,
    keyLabel,
    listSystemServices,
    navigate,
    navigateBack,
    serviceDetails,
    type Effect,
    type Message,
    type ServiceAction,
    type ServiceUnit,
    type SharedContext,
} from '@srvdeck/core';

const ACTION_KEYS: Readonly<Partial<Record<string, ServiceAction>>> = {
    s: 'status',
    a: 'start',
    t: 'stop',
    e: 'restart',
};

interface Details {
    readonly name: string;
    readonly lines: readonly string[] | undefined;
}

export class ServiceListView extends BaseView<React.ReactElement> {
    private units: readonly ServiceUnit[] = [];
    private cursorIndex = 0;
    private loading = false;
    private problem: string | undefined = undefined;
    private shown: Details | undefined = undefined;

    constructor(private readonly context: SharedContext) {
        super();
    }

    get services(): readonly ServiceUnit[] {
        return this.units;
    }

    get cursor(): number {
        return this.cursorIndex;
    }

    get isLoading(): boolean {
        return this.loading;
    }

    get error(): string | undefined {
        return this.problem;
    }

    get details(): Details | undefined {
        return this.shown;
    }

    override init(): Effect {
        this.shown = undefined;
        return this.reload();
    }

    update(message: Message): Effect {
        switch (message.type) {
            case 'services-loaded':
                this.units = message.services;
                this.cursorIndex = Math.min(this.cursorIndex, Math.max(0, this.units.length - 1));
                this.loading = false;
                this.problem = undefined;
                return Effects.none();
            case 'service-details-loaded':
                if (this.shown?.name === message.name) this.shown = { name: message.name, lines: message.lines };
                return Effects.none();
            case 'effect-failed':
                this.loading = false;
                this.problem = message.error;
                return Effects.none();
            case 'key':
                return this.handleKey(keyLabel(message.key));
            default:
                return Effects.none();
        }
    }

    private reload(): Effect {
        this.loading = true;
        const runner = this.context.runner;
        return Effects.task(
            'list services',
            async () => ({ type: 'services-loaded', target: 'service-list', services: await listSystemServices(runner) }),
            'service-list',
        );
    }

    private handleKey(label: string): Effect {
        if (label === 'esc') {
            if (this.shown !== undefined) {
                this.shown = undefined;
                return Effects.none();
            }
            return Effects.message(navigateBack());
        }
        if (label === 'q') return Effects.message(navigateBack());

        switch (label) {
            case 'up':
            case 'k':
                if (this.cursorIndex > 0) this.cursorIndex -= 1;
                return Effects.none();
            case 'down':
            case 'j':
                if (this.cursorIndex < this.units.length - 1) this.cursorIndex += 1;
                return Effects.none();
            case 'r':
                return this.reload();
            case 'enter':
                return this.showDetails();
        }

        const action = ACTION_KEYS[label];
        const unit = this.units[this.cursorIndex];
        if (action === undefined || unit === undefined) return Effects.none();
        return Effects.message(
            navigate('processing', { kind: 'processing', action: { kind: 'service-control', service: unit.name, action } }),
        );
    }

    private showDetails(): Effect {
        const unit = this.units[this.cursorIndex];
        if (unit === undefined) return Effects.none();
        const name = unit.name;
        const runner = this.context.runner;
        this.shown = { name, lines: undefined };
        return Effects.task(
            `status of ${name}`,
            async () => ({
                type: 'service-details-loaded',
                target: 'service-list',
                name,
                lines: await serviceDetails(runner, name),
            }),
            'service-list',
        );
    }

    // ─── Render ───────────────────────────────────────────────────

    private stateColor(unit: ServiceUnit): string {
        if (unit.active === 'active') return 'green';
        if (unit.active === 'failed') return 'red';
        return 'gray';
    }

    render(): React.ReactElement {
        const height = this.context.viewableLines();
        const top = Math.max(0, Math.min(this.cursorIndex - height + 1, this.units.length - height));
        const visible = this.units.slice(top, top + height);

        return (
            <Box flexDirection="column" borderStyle="round" borderColor="magenta" paddingX={1}>
                <Text bold color="magenta">⚙️  System Services</Text>
                <Text> </Text>
                {this.loading && <Text color="yellow">⏳ Loading services...</Text>}
                {this.problem !== undefined && <Text color="red">❌ {this.problem}</Text>}
                {!this.loading && this.problem === undefined && this.units.length === 0 && (
                    <Text color="gray">No known services found.</Text>
                )}
                {visible.map((unit, i) => {
                    const selected = top + i === this.cursorIndex;
                    return (
                        <Text key={unit.name}>
                            <Text color={selected ? 'yellow' : 'gray'}>{selected ? '> ' : '  '}</Text>
                            <Text bold={selected}>{unit.name.padEnd(22)}</Text>
                            <Text color={this.stateColor(unit)}>{unit.active}</Text>
                            <Text color="gray"> ({unit.sub})</Text>
                        </Text>
                    );
                })}
                {this.shown !== undefined && (
                    <Box flexDirection="column" marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
                        <Text bold>{this.shown.name}</Text>
                        {this.shown.lines === undefined ? (
                            <Text color="yellow">⏳ Loading status...</Text>
                        ) : (
                            this.shown.lines.map((line, i) => (
                                <Text key={i} wrap="truncate-end">{line}</Text>
                            ))
                        )}
                    </Box>
                )}
                <Text> </Text>
                <Text color="gray" dimColor>
                    ↑/↓ select · Enter details · s status · a start · t stop · e restart · r refresh · Esc back
                </Text>
            </Box>
        );
    }
}
