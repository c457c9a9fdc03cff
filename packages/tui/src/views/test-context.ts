/**
 * @srvdeck/tui — Test Context
 *
 * A SharedContext wired to in-process stand-ins, and a helper that runs
 * the background tasks inside an effect the way the Program would.
 */

import {
    flattenEffects,
    MemoryCommandLog,
    ScriptedRunner,
    SharedContext,
    SYNTHETIC_METRICS,
    type Effect,
    type Message,
    type MonitoringSnapshot,
    type MonitoringSource,
    type RunnerScript,
    type TimeRange,
} from '@srvdeck/core';
import { ConfigStore, type AppConfig, type OsFamily } from '@srvdeck/shared';

export interface TestContextOptions {
    readonly script?: RunnerScript;
    readonly monitor?: MonitoringSource;
    readonly config?: AppConfig;
    readonly os?: OsFamily;
}

export interface TestContext {
    readonly context: SharedContext;
    readonly runner: ScriptedRunner;
    readonly log: MemoryCommandLog;
}

export const TEST_NOW = new Date(2026, 0, 2, 3, 4, 5);

/** Always answers with the synthetic figures; counts requests per range. */
export class StaticMonitor implements MonitoringSource {
    readonly requests: TimeRange[] = [];

    async snapshot(range: TimeRange): Promise<MonitoringSnapshot> {
        this.requests.push(range);
        return {
            range,
            system: SYNTHETIC_METRICS,
            history: { cpu: [], memory: [], load: [] },
            events: [],
            synthetic: true,
            error: 'failed to connect to monitoring agent: connection refused',
            fetchedAt: TEST_NOW,
        };
    }
}

export function testContext(options: TestContextOptions = {}): TestContext {
    const runner = new ScriptedRunner(options.script, () => TEST_NOW);
    const log = new MemoryCommandLog(() => TEST_NOW);
    const context = new SharedContext({
        config: options.config ?? ConfigStore.defaults(),
        os: options.os ?? 'ubuntu',
        commandLog: log,
        runner,
        monitor: options.monitor ?? new StaticMonitor(),
        now: () => TEST_NOW,
    });
    return { context, runner, log };
}

/** Leaf effects of the given kind */
export function effectsOfKind<K extends Effect['kind']>(effect: Effect, kind: K): Array<Extract<Effect, { kind: K }>> {
    return flattenEffects(effect).filter((leaf): leaf is Extract<Effect, { kind: K }> => leaf.kind === kind);
}

/** Run every task in `effect` and collect the messages they resolve with. */
export async function runTasks(effect: Effect): Promise<Message[]> {
    const messages: Message[] = [];
    for (const task of effectsOfKind(effect, 'task')) {
        const message = await task.run();
        if (message !== null) messages.push(message);
    }
    return messages;
}

/** Messages posted directly by `message` effects */
export function postedMessages(effect: Effect): Message[] {
    return effectsOfKind(effect, 'message').map((leaf) => leaf.message);
}
