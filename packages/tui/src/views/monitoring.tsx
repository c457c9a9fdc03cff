/**
 * @srvdeck/tui — Monitoring View
 *
 * Live figures, metric history and events from the monitoring agent.
 *
 * Every fetch carries the generation it was started in. Leaving the
 * screen, changing the range, refreshing or toggling auto-refresh bumps
 * the generation, so ticks and loads from before are dropped on arrival
 * and at most one refresh chain is ever alive.
 */

import React from 'react';
import { Box, Text } from 'ink';
import {
    average,
    BaseView,
    Effects,
    keyLabel,
    navigateBack,
    TIME_RANGES,
    type Effect,
    type Message,
    type MetricPoint,
    type MonitoringSnapshot,
    type SharedContext,
    type TimeRange,
} from '@srvdeck/core';

export const MONITORING_TABS = ['live', 'history', 'events'] as const;
export type MonitoringTab = (typeof MONITORING_TABS)[number];

const TAB_KEYS: Readonly<Partial<Record<string, MonitoringTab>>> = { l: 'live', h: 'history', e: 'events' };
const RANGE_KEYS: Readonly<Partial<Record<string, TimeRange>>> = { '1': '1h', '6': '6h', d: '24h', w: '7d', m: '30d' };

const MAX_EVENTS = 15;

export function formatUptime(seconds: number): string {
    const days = Math.floor(seconds / 86_400);
    const hours = Math.floor((seconds % 86_400) / 3_600);
    const minutes = Math.floor((seconds % 3_600) / 60);
    if (days > 0) return `${days}d ${hours}h ${minutes}m`;
    if (hours > 0) return `${hours}h ${minutes}m`;
    return `${minutes}m`;
}

/** Ten-cell bar for a percentage */
export function usageBar(percent: number): string {
    const filled = Math.round(Math.min(100, Math.max(0, percent)) / 10);
    return '█'.repeat(filled) + '░'.repeat(10 - filled);
}

function usageColor(percent: number): string {
    if (percent >= 90) return 'red';
    if (percent >= 70) return 'yellow';
    return 'green';
}

export class MonitoringView extends BaseView<React.ReactElement> {
    private currentTab: MonitoringTab = 'live';
    private currentRange: TimeRange = '1h';
    private auto = true;
    private gen = 0;
    private loading = false;
    private latest: MonitoringSnapshot | undefined = undefined;

    constructor(private readonly context: SharedContext) {
        super();
    }

    get tab(): MonitoringTab {
        return this.currentTab;
    }

    get range(): TimeRange {
        return this.currentRange;
    }

    get autoRefresh(): boolean {
        return this.auto;
    }

    get generation(): number {
        return this.gen;
    }

    get isLoading(): boolean {
        return this.loading;
    }

    get snapshot(): MonitoringSnapshot | undefined {
        return this.latest;
    }

    override init(): Effect {
        this.auto = this.context.config.monitoring.autoRefresh;
        return this.restart();
    }

    update(message: Message): Effect {
        switch (message.type) {
            case 'monitoring-loaded':
                if (message.generation !== this.gen) return Effects.none();
                this.latest = message.snapshot;
                this.loading = false;
                return this.auto
                    ? Effects.tick(this.context.config.monitoring.refreshIntervalMs, {
                          type: 'monitor-tick',
                          target: 'monitoring',
                          generation: this.gen,
                      })
                    : Effects.none();
            case 'monitor-tick':
                return message.generation === this.gen ? this.fetch() : Effects.none();
            case 'key':
                return this.handleKey(keyLabel(message.key));
            default:
                return Effects.none();
        }
    }

    private handleKey(label: string): Effect {
        const tab = TAB_KEYS[label];
        if (tab !== undefined) {
            this.currentTab = tab;
            return Effects.none();
        }
        const range = RANGE_KEYS[label];
        if (range !== undefined) {
            this.currentRange = range;
            return this.restart();
        }

        switch (label) {
            case 'r':
                return this.restart();
            case 'a':
                this.auto = !this.auto;
                return this.restart();
            case 'esc':
            case 'q':
                this.gen += 1;
                return Effects.message(navigateBack());
            default:
                return Effects.none();
        }
    }

    /** Drop whatever is in flight and fetch again under a new generation. */
    private restart(): Effect {
        this.gen += 1;
        return this.fetch();
    }

    private fetch(): Effect {
        this.loading = true;
        const generation = this.gen;
        const range = this.currentRange;
        const monitor = this.context.monitor;
        return Effects.task(
            'monitoring snapshot',
            async () => ({
                type: 'monitoring-loaded',
                target: 'monitoring',
                generation,
                snapshot: await monitor.snapshot(range),
            }),
            'monitoring',
        );
    }

    // ─── Render ───────────────────────────────────────────────────

    private renderLive(snapshot: MonitoringSnapshot): React.ReactElement {
        const system = snapshot.system;
        const gauges: Array<readonly [string, number]> = [
            ['CPU', system.cpuPercent],
            ['Memory', system.memoryPercent],
            ['Disk', system.diskPercent],
        ];
        return (
            <Box flexDirection="column">
                {gauges.map(([label, value]) => (
                    <Text key={label}>
                        {label.padEnd(8)}
                        <Text color={usageColor(value)}>{usageBar(value)}</Text> {value.toFixed(1)}%
                    </Text>
                ))}
                <Text>{'Load'.padEnd(8)}{system.load1.toFixed(2)}</Text>
                <Text>{'Uptime'.padEnd(8)}{formatUptime(system.uptimeSeconds)}</Text>
            </Box>
        );
    }

    private renderHistory(snapshot: MonitoringSnapshot): React.ReactElement {
        const series: Array<readonly [string, readonly MetricPoint[], number]> = [
            ['CPU %', snapshot.history.cpu, 1],
            ['Memory %', snapshot.history.memory, 1],
            ['Load', snapshot.history.load, 2],
        ];
        return (
            <Box flexDirection="column">
                <Text color="gray">{TIME_RANGES[snapshot.range].label}</Text>
                {series.map(([label, points, digits]) =>
                    points.length === 0 ? (
                        <Text key={label}>{label.padEnd(10)}<Text color="gray">no data</Text></Text>
                    ) : (
                        <Text key={label}>
                            {label.padEnd(10)}avg {average(points).toFixed(digits)} · max{' '}
                            {Math.max(...points.map((p) => p.value)).toFixed(digits)} · {points.length} samples
                        </Text>
                    ),
                )}
            </Box>
        );
    }

    private renderEvents(snapshot: MonitoringSnapshot): React.ReactElement {
        if (snapshot.events.length === 0) return <Text color="gray">No events in this range.</Text>;
        return (
            <Box flexDirection="column">
                {snapshot.events.slice(0, MAX_EVENTS).map((event) => (
                    <Text key={event.id} wrap="truncate-end">
                        <Text color="gray">{event.timestamp} </Text>
                        <Text color={event.severity === 'critical' ? 'red' : event.severity === 'warning' ? 'yellow' : 'cyan'}>
                            [{event.severity}]
                        </Text>{' '}
                        {event.message}
                    </Text>
                ))}
            </Box>
        );
    }

    render(): React.ReactElement {
        const snapshot = this.latest;
        let body: React.ReactElement;
        if (snapshot === undefined) body = <Text color="yellow">⏳ Loading metrics...</Text>;
        else if (this.currentTab === 'live') body = this.renderLive(snapshot);
        else if (this.currentTab === 'history') body = this.renderHistory(snapshot);
        else body = this.renderEvents(snapshot);

        return (
            <Box flexDirection="column" borderStyle="round" borderColor="green" paddingX={1}>
                <Text bold color="green">📈 Monitoring</Text>
                <Text>
                    {MONITORING_TABS.map((tab) => (
                        <Text key={tab} color={tab === this.currentTab ? 'yellow' : 'gray'} bold={tab === this.currentTab}>
                            {` ${tab} `}
                        </Text>
                    ))}
                    <Text color="gray">  range {this.currentRange} · auto-refresh {this.auto ? 'on' : 'off'}</Text>
                    {this.loading && <Text color="yellow"> ⏳</Text>}
                </Text>
                {snapshot?.synthetic === true && (
                    <Text color="yellow">⚠️ Agent unavailable, showing sample figures ({snapshot.error ?? 'unknown error'})</Text>
                )}
                <Text> </Text>
                {body}
                <Text> </Text>
                <Text color="gray" dimColor>l/h/e tabs · 1/6/d/w/m range · r refresh · a auto-refresh · Esc back</Text>
            </Box>
        );
    }
}
