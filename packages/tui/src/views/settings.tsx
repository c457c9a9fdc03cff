/**
 * @srvdeck/tui — Settings View
 *
 * Shows the effective configuration and a handful of actions that write
 * it back through the config store.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { BaseView, Effects, keyLabel, navigateBack, type Effect, type Message, type SharedContext } from '@srvdeck/core';
import {
    ConfigStore,
    errorMessage,
    OS_FAMILY_SETTINGS,
    type AppConfig,
    type AppConfigPatch,
    type OsFamilySetting,
} from '@srvdeck/shared';

/** The part of ConfigStore this screen writes through */
export interface SettingsStore {
    update(patch: AppConfigPatch): AppConfig;
    reset(): AppConfig;
}

export const SETTINGS_ITEMS = [
    'Toggle monitoring auto-refresh',
    'Cycle OS override',
    'Clear command log',
    'Reset to defaults',
    'Back',
] as const;

interface Notice {
    readonly text: string;
    readonly ok: boolean;
}

export function nextOsSetting(current: OsFamilySetting): OsFamilySetting {
    const index = OS_FAMILY_SETTINGS.indexOf(current);
    return OS_FAMILY_SETTINGS[(index + 1) % OS_FAMILY_SETTINGS.length] ?? 'auto';
}

export class SettingsView extends BaseView<React.ReactElement> {
    private cursorIndex = 0;
    private last: Notice | undefined = undefined;

    constructor(
        private readonly context: SharedContext,
        private readonly store: SettingsStore = ConfigStore,
    ) {
        super();
    }

    get cursor(): number {
        return this.cursorIndex;
    }

    get notice(): Notice | undefined {
        return this.last;
    }

    override init(): Effect {
        this.last = undefined;
        return Effects.none();
    }

    update(message: Message): Effect {
        if (message.type !== 'key') return Effects.none();

        switch (keyLabel(message.key)) {
            case 'up':
            case 'k':
                if (this.cursorIndex > 0) this.cursorIndex -= 1;
                return Effects.none();
            case 'down':
            case 'j':
                if (this.cursorIndex < SETTINGS_ITEMS.length - 1) this.cursorIndex += 1;
                return Effects.none();
            case 'enter':
            case 'space':
                return this.select();
            case 'esc':
            case 'q':
                return Effects.message(navigateBack());
            default:
                return Effects.none();
        }
    }

    private select(): Effect {
        const item = SETTINGS_ITEMS[this.cursorIndex];
        if (item === 'Back') return Effects.message(navigateBack());

        try {
            this.last = { text: this.apply(item), ok: true };
        } catch (err) {
            this.last = { text: errorMessage(err), ok: false };
            this.context.log(`Settings: ${this.last.text}`, 'red');
        }
        return Effects.none();
    }

    private apply(item: (typeof SETTINGS_ITEMS)[number] | undefined): string {
        const config = this.context.config;
        switch (item) {
            case 'Toggle monitoring auto-refresh': {
                const autoRefresh = !config.monitoring.autoRefresh;
                this.context.config = this.store.update({ monitoring: { autoRefresh } });
                return `Monitoring auto-refresh ${autoRefresh ? 'enabled' : 'disabled'}`;
            }
            case 'Cycle OS override': {
                const osFamily = nextOsSetting(config.osFamily);
                this.context.config = this.store.update({ osFamily });
                return `OS override set to ${osFamily} (applies on next start)`;
            }
            case 'Clear command log':
                this.context.commandLog.clear();
                return `Cleared ${this.context.commandLog.path}`;
            case 'Reset to defaults':
                this.context.config = this.store.reset();
                return 'Configuration reset to defaults';
            default:
                return '';
        }
    }

    // ─── Render ───────────────────────────────────────────────────

    render(): React.ReactElement {
        const config = this.context.config;
        const rows: Array<readonly [string, string]> = [
            ['Shell', config.shell],
            ['Detected OS', this.context.os],
            ['OS override', config.osFamily],
            ['Command log', this.context.commandLog.path],
            ['Monitoring endpoint', config.monitoring.endpoint],
            ['Refresh interval', `${config.monitoring.refreshIntervalMs}ms`],
            ['Auto-refresh', config.monitoring.autoRefresh ? 'on' : 'off'],
            ['Backup path', config.backups.localPath],
            ['Backup retention', `${config.backups.retentionDays} days`],
        ];

        return (
            <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1}>
                <Text bold color="yellow">⚙️  Settings</Text>
                <Text> </Text>
                {rows.map(([label, value]) => (
                    <Text key={label}>
                        <Text color="gray">{label.padEnd(22)}</Text>
                        {value}
                    </Text>
                ))}
                <Text> </Text>
                {SETTINGS_ITEMS.map((item, i) => {
                    const selected = i === this.cursorIndex;
                    return (
                        <Text key={item}>
                            <Text color={selected ? 'yellow' : 'gray'}>{selected ? '> ' : '  '}</Text>
                            <Text color={selected ? 'yellow' : 'white'} bold={selected}>{item}</Text>
                        </Text>
                    );
                })}
                {this.last !== undefined && (
                    <>
                        <Text> </Text>
                        <Text color={this.last.ok ? 'green' : 'red'}>{this.last.ok ? '✅' : '❌'} {this.last.text}</Text>
                    </>
                )}
                <Text> </Text>
                <Text color="gray" dimColor>↑/↓ select · Enter apply · Esc back</Text>
            </Box>
        );
    }
}
