/**
 * @srvdeck/core — Metrics Client
 *
 * Reads live metrics, metric history and events from the local
 * monitoring agent's HTTP API. The agent is optional: when it cannot be
 * reached, `snapshot()` returns synthetic figures flagged as such so the
 * monitoring screen still has something to draw.
 */

import { z } from 'zod';
import { errorMessage } from '@srvdeck/shared';
import { MonitoringUnavailableError } from '../errors.js';

// ─── Time Ranges ──────────────────────────────────────────────────

export const TIME_RANGES = {
    '1h': { label: 'Last hour', ms: 60 * 60 * 1000 },
    '6h': { label: 'Last 6 hours', ms: 6 * 60 * 60 * 1000 },
    '24h': { label: 'Last 24 hours', ms: 24 * 60 * 60 * 1000 },
    '7d': { label: 'Last 7 days', ms: 7 * 24 * 60 * 60 * 1000 },
    '30d': { label: 'Last 30 days', ms: 30 * 24 * 60 * 60 * 1000 },
} as const;

export type TimeRange = keyof typeof TIME_RANGES;

// ─── Wire Schemas ─────────────────────────────────────────────────

const UsageSchema = z.object({ usage_percent: z.number() });

const SystemMetricsResponse = z.object({
    cpu: UsageSchema,
    memory: UsageSchema,
    disk: z.array(UsageSchema).default([]),
    load: z.object({ load1: z.number() }),
    uptime_seconds: z.number().optional(),
});

const MetricsResponse = z.object({
    metrics: z
        .array(
            z.object({
                timestamp: z.string(),
                metric_name: z.string(),
                value: z.number(),
            }),
        )
        .default([]),
});

const EventsResponse = z.object({
    events: z
        .array(
            z.object({
                id: z.union([z.number(), z.string()]),
                timestamp: z.string(),
                event_type: z.string(),
                severity: z.string(),
                message: z.string(),
            }),
        )
        .default([]),
});

// ─── Types ────────────────────────────────────────────────────────

export interface SystemMetrics {
    readonly cpuPercent: number;
    readonly memoryPercent: number;
    readonly diskPercent: number;
    readonly load1: number;
    readonly uptimeSeconds: number;
}

export interface MetricPoint {
    readonly timestamp: string;
    readonly value: number;
}

export interface MetricHistory {
    readonly cpu: readonly MetricPoint[];
    readonly memory: readonly MetricPoint[];
    readonly load: readonly MetricPoint[];
}

export interface MonitoringEvent {
    readonly id: string;
    readonly timestamp: string;
    readonly type: string;
    readonly severity: string;
    readonly message: string;
}

export interface MonitoringSnapshot {
    readonly range: TimeRange;
    readonly system: SystemMetrics;
    readonly history: MetricHistory;
    readonly events: readonly MonitoringEvent[];
    /** True when the agent was unreachable and the figures are made up */
    readonly synthetic: boolean;
    /** Why the agent could not be used, when synthetic */
    readonly error?: string;
    readonly fetchedAt: Date;
}

export interface MonitoringSource {
    snapshot(range: TimeRange): Promise<MonitoringSnapshot>;
}

export interface MetricsClientOptions {
    readonly endpoint: string;
    readonly timeoutMs: number;
    readonly fetch?: typeof fetch;
    readonly now?: () => Date;
}

const SEVEN_DAYS_SECONDS = 7 * 24 * 60 * 60;

export const SYNTHETIC_METRICS: SystemMetrics = {
    cpuPercent: 25.5,
    memoryPercent: 68.2,
    diskPercent: 45.1,
    load1: 1.23,
    uptimeSeconds: SEVEN_DAYS_SECONDS,
};

export function average(points: readonly MetricPoint[]): number {
    if (points.length === 0) return 0;
    return points.reduce((sum, point) => sum + point.value, 0) / points.length;
}

// ─── Client ───────────────────────────────────────────────────────

export class MetricsClient implements MonitoringSource {
    private readonly endpoint: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;
    private readonly now: () => Date;

    constructor(options: MetricsClientOptions) {
        this.endpoint = options.endpoint.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetch ?? fetch;
        this.now = options.now ?? (() => new Date());
    }

    /** Live figures, agent or synthetic. Never rejects. */
    async snapshot(range: TimeRange): Promise<MonitoringSnapshot> {
        const fetchedAt = this.now();
        const until = fetchedAt;
        const since = new Date(until.getTime() - TIME_RANGES[range].ms);

        try {
            const [system, cpu, memory, load, events] = await Promise.all([
                this.fetchSystemMetrics(),
                this.fetchMetricHistory('cpu.usage_percent', since, until),
                this.fetchMetricHistory('memory.usage_percent', since, until),
                this.fetchMetricHistory('load.load1', since, until),
                this.fetchEvents(since, until),
            ]);
            return { range, system, history: { cpu, memory, load }, events, synthetic: false, fetchedAt };
        } catch (err) {
            return {
                range,
                system: SYNTHETIC_METRICS,
                history: { cpu: [], memory: [], load: [] },
                events: [],
                synthetic: true,
                error: errorMessage(err),
                fetchedAt,
            };
        }
    }

    async fetchSystemMetrics(): Promise<SystemMetrics> {
        const data = SystemMetricsResponse.parse(await this.getJson('/api/v1/metrics/system'));
        return {
            cpuPercent: data.cpu.usage_percent,
            memoryPercent: data.memory.usage_percent,
            diskPercent: data.disk[0]?.usage_percent ?? 0,
            load1: data.load.load1,
            uptimeSeconds: data.uptime_seconds ?? 0,
        };
    }

    async fetchMetricHistory(metricName: string, since: Date, until: Date): Promise<MetricPoint[]> {
        const params = new URLSearchParams({
            metric_name: metricName,
            since: since.toISOString(),
            until: until.toISOString(),
            limit: '100',
        });
        const data = MetricsResponse.parse(await this.getJson(`/api/v1/metrics?${params.toString()}`));
        return data.metrics.map((metric) => ({ timestamp: metric.timestamp, value: metric.value }));
    }

    async fetchEvents(since: Date, until: Date): Promise<MonitoringEvent[]> {
        const params = new URLSearchParams({
            since: since.toISOString(),
            until: until.toISOString(),
            limit: '50',
        });
        const data = EventsResponse.parse(await this.getJson(`/api/v1/events?${params.toString()}`));
        return data.events.map((event) => ({
            id: String(event.id),
            timestamp: event.timestamp,
            type: event.event_type,
            severity: event.severity,
            message: event.message,
        }));
    }

    private async getJson(path: string): Promise<unknown> {
        let res: Response;
        try {
            res = await this.fetchImpl(`${this.endpoint}${path}`, {
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (err) {
            throw new MonitoringUnavailableError(
                `failed to connect to monitoring agent: ${errorMessage(err)}`,
                this.endpoint,
            );
        }

        if (!res.ok) {
            throw new MonitoringUnavailableError(`monitoring agent returned status ${res.status}`, this.endpoint);
        }
        return res.json();
    }
}
