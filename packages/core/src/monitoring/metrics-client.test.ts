import { describe, it, expect, vi, afterEach } from 'vitest';
import { MetricsClient, SYNTHETIC_METRICS, average } from './metrics-client.js';
import { MonitoringUnavailableError } from '../errors.js';

const NOW = new Date('2026-05-01T12:00:00.000Z');

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function agentResponses(url: string): Response {
    if (url.includes('/api/v1/metrics/system')) {
        return json({
            cpu: { usage_percent: 12.5 },
            memory: { usage_percent: 40 },
            disk: [{ usage_percent: 71.2 }, { usage_percent: 10 }],
            load: { load1: 0.5 },
            uptime_seconds: 3600,
        });
    }
    if (url.includes('/api/v1/metrics?')) {
        const name = new URL(url).searchParams.get('metric_name') ?? '';
        return json({ metrics: [{ timestamp: '2026-05-01T11:30:00Z', metric_name: name, value: 2 }] });
    }
    if (url.includes('/api/v1/events')) {
        return json({
            events: [
                { id: 7, timestamp: '2026-05-01T11:00:00Z', event_type: 'service', severity: 'warning', message: 'caddy restarted' },
            ],
        });
    }
    return json({}, 404);
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('MetricsClient', () => {
    it('builds a snapshot from the agent', async () => {
        const fetchMock = vi.fn(async (input: string | URL | Request) => agentResponses(String(input)));
        vi.stubGlobal('fetch', fetchMock);
        const client = new MetricsClient({ endpoint: 'http://localhost:9090/', timeoutMs: 500, now: () => NOW });

        const snapshot = await client.snapshot('1h');

        expect(snapshot.synthetic).toBe(false);
        expect(snapshot.error).toBeUndefined();
        expect(snapshot.system).toEqual({
            cpuPercent: 12.5,
            memoryPercent: 40,
            diskPercent: 71.2,
            load1: 0.5,
            uptimeSeconds: 3600,
        });
        expect(snapshot.history.cpu).toEqual([{ timestamp: '2026-05-01T11:30:00Z', value: 2 }]);
        expect(snapshot.events).toEqual([
            { id: '7', timestamp: '2026-05-01T11:00:00Z', type: 'service', severity: 'warning', message: 'caddy restarted' },
        ]);
        expect(fetchMock).toHaveBeenCalledTimes(5);
    });

    it('queries history for the selected range', async () => {
        const urls: string[] = [];
        const client = new MetricsClient({
            endpoint: 'http://agent:9090',
            timeoutMs: 500,
            now: () => NOW,
            fetch: async (input) => {
                urls.push(String(input));
                return agentResponses(String(input));
            },
        });

        await client.snapshot('6h');

        const cpu = urls.find((url) => url.includes('metric_name=cpu.usage_percent'));
        expect(cpu).toBe(
            'http://agent:9090/api/v1/metrics?metric_name=cpu.usage_percent&since=2026-05-01T06%3A00%3A00.000Z&until=2026-05-01T12%3A00%3A00.000Z&limit=100',
        );
    });

    it('falls back to synthetic figures when the agent is unreachable', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new Error('ECONNREFUSED'))));
        const client = new MetricsClient({ endpoint: 'http://localhost:9090', timeoutMs: 500, now: () => NOW });

        const snapshot = await client.snapshot('24h');

        expect(snapshot.synthetic).toBe(true);
        expect(snapshot.system).toEqual(SYNTHETIC_METRICS);
        expect(snapshot.system.uptimeSeconds).toBe(604800);
        expect(snapshot.error).toBe('failed to connect to monitoring agent: ECONNREFUSED');
        expect(snapshot.fetchedAt).toEqual(NOW);
    });

    it('reports a non-OK status as unavailable', async () => {
        const client = new MetricsClient({
            endpoint: 'http://localhost:9090',
            timeoutMs: 500,
            fetch: async () => json({ error: 'down' }, 503),
        });

        await expect(client.fetchSystemMetrics()).rejects.toThrow(MonitoringUnavailableError);
        await expect(client.fetchSystemMetrics()).rejects.toThrow('monitoring agent returned status 503');
    });
});

describe('average', () => {
    it('averages point values', () => {
        expect(average([])).toBe(0);
        expect(average([{ timestamp: 'a', value: 1 }, { timestamp: 'b', value: 4 }])).toBe(2.5);
    });
});
