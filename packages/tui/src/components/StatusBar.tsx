/**
 * StatusBar — Persistent console state bar
 *
 * Displays: app name and version, target OS, the current screen, and
 * the execution queue's progress with a spinner while a command runs.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { APP_NAME, APP_VERSION, type OsFamily } from '@srvdeck/shared';
import type { NavigationState } from '@srvdeck/core';
import { SPINNER_FRAMES } from './spinner.js';

// ─── Props ────────────────────────────────────────────────────────

export interface QueueProgress {
    readonly active: boolean;
    readonly label: string;
    /** 1-based position of the running command */
    readonly position: number;
    readonly total: number;
}

export interface StatusBarProps {
    readonly os: OsFamily;
    readonly screen: NavigationState;
    readonly queue: QueueProgress;
    readonly processingMessage: string;
    readonly spinnerFrame: number;
}

// ─── Component ────────────────────────────────────────────────────

export function StatusBar({ os, screen, queue, processingMessage, spinnerFrame }: StatusBarProps): React.ReactElement {
    const spinner = SPINNER_FRAMES[spinnerFrame % SPINNER_FRAMES.length] ?? '';

    return (
        <Box
            borderStyle="single"
            borderColor={queue.active ? 'yellow' : 'gray'}
            paddingX={1}
            justifyContent="space-between"
        >
            {/* Left: App + OS */}
            <Box gap={2}>
                <Text color="red" bold>
                    {APP_NAME} v{APP_VERSION}
                </Text>
                <Text color={os === 'unknown' ? 'yellow' : 'green'}>● {os}</Text>
            </Box>

            {/* Center: Queue */}
            <Box gap={2}>
                {queue.active ? (
                    <Text color="yellow">
                        {spinner} {queue.label} {queue.position}/{queue.total}
                        {processingMessage !== '' ? ` · ${processingMessage}` : ''}
                    </Text>
                ) : (
                    <Text color="gray">idle</Text>
                )}
            </Box>

            {/* Right: Screen */}
            <Text color="cyan">{screen}</Text>
        </Box>
    );
}
