/**
 * @srvdeck/tui — Processing View
 *
 * Shows a command queue while it runs (header, results log, the last
 * command's output) or a read-only report collected in the background.
 * The action handed over on navigation decides which; returning to this
 * screen without one keeps whatever it showed last.
 */

import React from 'react';
import { Box, Text } from 'ink';
import {
    BaseView,
    collectServiceStatus,
    collectSystemStatus,
    controlService,
    Effects,
    installableServices,
    keyLabel,
    navigateBack,
    planGithubSshKey,
    planInstall,
    planSecurityAssessment,
    type CommandPlan,
    type CommandRunner,
    type Effect,
    type ExecutionResult,
    type Message,
    type NavigationPayload,
    type ProcessingAction,
    type SharedContext,
} from '@srvdeck/core';
import { errorMessage } from '@srvdeck/shared';
import { SPINNER_FRAMES } from '../components/spinner.js';
import { reportLineStyle } from '../components/line-style.js';
import { ScrollState } from './scroll.js';

type Mode = 'queue' | 'report';

const MAX_OUTPUT_LINES = 40;

export class ProcessingView extends BaseView<React.ReactElement> {
    private pending: ProcessingAction | undefined = undefined;
    private mode: Mode = 'queue';
    private header: string[] = [];
    private loading = false;
    /** lastResult at the moment the current queue was shown, to tell its output apart */
    private resultBefore: ExecutionResult | undefined = undefined;
    private readonly scroll = new ScrollState(true);

    constructor(private readonly context: SharedContext) {
        super();
    }

    override initialize(payload: NavigationPayload | undefined): void {
        this.pending = payload?.kind === 'processing' ? payload.action : undefined;
    }

    override init(): Effect {
        const action = this.pending;
        this.pending = undefined;
        if (action === undefined) return Effects.none();

        this.scroll.reset(true);
        switch (action.kind) {
            case 'install':
                return this.runPlanned(() => planInstall(action.service, this.context.os), [
                    `Supported services: ${installableServices().join(', ')}`,
                ]);
            case 'service-control':
                return this.runPlanned(() => controlService(action.service, action.action));
            case 'security-assessment':
                return this.runPlanned(() => planSecurityAssessment());
            case 'github-key':
                return this.runPlanned(() => planGithubSshKey());
            case 'run-queue':
                return this.showQueue();
            case 'service-status':
                return this.collect('Service status', collectServiceStatus);
            case 'system-status':
                return this.collect('System status', collectSystemStatus);
            case 'report':
                this.showReport([action.title, '', ...action.lines]);
                return Effects.none();
        }
    }

    // ─── State ────────────────────────────────────────────────────

    get isComplete(): boolean {
        if (this.mode === 'report') return !this.loading;
        const queue = this.context.queue;
        return !queue.isActive && !queue.hasNext();
    }

    /** Everything the screen would scroll through */
    get lines(): string[] {
        if (this.mode === 'report') return [...this.header];

        const lines = [...this.header, ...this.context.queue.resultsLog];
        const last = this.context.lastResult;
        if (this.isComplete && last !== undefined && last !== this.resultBefore) {
            const output = last.combinedOutput.trimEnd();
            if (output !== '') {
                const outputLines = output.split('\n');
                lines.push('', 'Output:', ...outputLines.slice(-MAX_OUTPUT_LINES).map((line) => `  ${line}`));
            }
        }
        return lines;
    }

    // ─── Actions ──────────────────────────────────────────────────

    /** Build a plan, load it into the shared queue and start it. Planning errors are shown inline. */
    private runPlanned(plan: () => CommandPlan, hints: readonly string[] = []): Effect {
        let built: CommandPlan;
        try {
            built = plan();
        } catch (err) {
            this.showReport([`❌ ${errorMessage(err)}`, ...(hints.length > 0 ? ['', ...hints] : [])]);
            return Effects.none();
        }
        this.context.queue.load(built.label, built.commands);
        return this.showQueue();
    }

    private showQueue(): Effect {
        const queue = this.context.queue;
        this.mode = 'queue';
        this.loading = false;
        this.resultBefore = this.context.lastResult;
        this.header = [
            `🔧 ${queue.label}`,
            '',
            ...queue.commands.map((command, i) => `${i + 1}. ${command.description}`),
            '',
        ];
        if (queue.isActive || !queue.hasNext()) return Effects.none();
        return Effects.message({ type: 'queue-start' });
    }

    private collect(title: string, load: (runner: CommandRunner) => Promise<string[]>): Effect {
        const runner = this.context.runner;
        this.mode = 'report';
        this.loading = true;
        this.header = [`⏳ Collecting ${title.toLowerCase()}...`];
        return Effects.task(
            title,
            async () => ({ type: 'report-loaded', target: 'processing', title, lines: await load(runner) }),
            'processing',
        );
    }

    private showReport(lines: string[]): void {
        this.mode = 'report';
        this.loading = false;
        this.header = lines;
    }

    // ─── Update ───────────────────────────────────────────────────

    update(message: Message): Effect {
        switch (message.type) {
            case 'report-loaded':
                this.showReport([...message.lines]);
                return Effects.none();
            case 'effect-failed':
                this.showReport([...this.header.filter((line) => !line.startsWith('⏳')), `❌ ${message.error}`]);
                return Effects.none();
            case 'key':
                return this.handleKey(keyLabel(message.key));
            default:
                return Effects.none();
        }
    }

    private handleKey(label: string): Effect {
        if (this.scroll.handle(label, this.lines.length, this.context.viewableLines())) {
            return Effects.none();
        }
        if (!this.isComplete) return Effects.none();

        switch (label) {
            case 'q':
                return Effects.quit();
            case 'esc':
            case 'enter':
            case 'space':
                return Effects.message(navigateBack());
            default:
                return Effects.none();
        }
    }

    // ─── Render ───────────────────────────────────────────────────

    render(): React.ReactElement {
        const lines = this.lines;
        const height = this.context.viewableLines();
        const top = this.scroll.top(lines.length, height);
        const visible = lines.slice(top, top + height);
        const complete = this.isComplete;
        const running = this.context.processingMessage;
        const spinner = SPINNER_FRAMES[this.context.spinnerFrame % SPINNER_FRAMES.length] ?? '';

        return (
            <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
                <Text bold color="cyan">🔄 Processing</Text>
                {!complete && running !== '' && (
                    <Text color="yellow">{spinner} {running}</Text>
                )}
                {!complete && this.mode === 'report' && (
                    <Text color="yellow">{spinner} Working...</Text>
                )}
                <Text> </Text>
                {visible.map((line, i) => {
                    const style = reportLineStyle(line);
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
                <Text color="gray" dimColor>
                    {complete ? 'Press Enter, Space, or Esc to continue, q to quit' : 'Processing... Press Ctrl+C to quit'}
                </Text>
                {lines.length > height && (
                    <Text color="gray" dimColor>↑/↓=Scroll, PageUp/PageDown=Fast scroll, Home/End=Jump</Text>
                )}
            </Box>
        );
    }
}
