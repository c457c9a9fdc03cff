/**
 * SystemLog — Compact system log panel
 *
 * Shows the most recent engine events (dispatches, completions, failures).
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { SystemLogEntry } from '@srvdeck/core';

// ─── Props ────────────────────────────────────────────────────────

export interface SystemLogProps {
    readonly logs: readonly SystemLogEntry[];
    /** Number of recent entries to display */
    readonly displayCount?: number;
}

// ─── Component ────────────────────────────────────────────────────

export function SystemLog({ logs, displayCount = 5 }: SystemLogProps): React.ReactElement | null {
    if (logs.length === 0) return null;
    const visible = logs.slice(-displayCount);

    return (
        <Box
            flexDirection="column"
            borderStyle="single"
            borderColor="gray"
            paddingX={1}
        >
            <Text bold color="gray" underline>System Log</Text>
            {visible.map((entry, i) => (
                <Text key={i} wrap="truncate-end">
                    <Text color="gray" dimColor>[{entry.time}] </Text>
                    <Text color={entry.color} dimColor>{entry.text}</Text>
                </Text>
            ))}
        </Box>
    );
}
