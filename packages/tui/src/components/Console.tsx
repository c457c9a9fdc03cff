/**
 * Console — Root Ink component
 *
 * Bridges Ink to the Program: key presses and terminal resizes are
 * posted to the mailbox, and every drained batch of messages triggers a
 * re-render of the active view with the status bar and system log.
 */

import React, { useEffect, useReducer } from 'react';
import { Box, useInput, useStdout } from 'ink';
import type { Program, RootController } from '@srvdeck/core';
import { toKeyPress } from '../infra/keys.js';
import { StatusBar } from './StatusBar.js';
import { SystemLog } from './SystemLog.js';

// ─── Props ────────────────────────────────────────────────────────

export interface ConsoleProps {
    readonly program: Program<React.ReactElement>;
    readonly controller: RootController<React.ReactElement>;
}

// ─── Component ────────────────────────────────────────────────────

export function Console({ program, controller }: ConsoleProps): React.ReactElement {
    const [, rerender] = useReducer((n: number) => n + 1, 0);
    const { stdout } = useStdout();

    useEffect(() => program.subscribe(rerender), [program]);

    useEffect(() => {
        const onResize = (): void => {
            program.post({ type: 'resize', width: stdout.columns, height: stdout.rows });
        };
        onResize();
        stdout.on('resize', onResize);
        return () => {
            stdout.off('resize', onResize);
        };
    }, [program, stdout]);

    useInput((input, key) => {
        program.post({ type: 'key', key: toKeyPress(input, key) });
    });

    const context = controller.context;
    const queue = context.queue;

    return (
        <Box flexDirection="column" width={context.terminalWidth}>
            <StatusBar
                os={context.os}
                screen={controller.current}
                queue={{
                    active: queue.isActive,
                    label: queue.label,
                    position: queue.cursor,
                    total: queue.commands.length,
                }}
                processingMessage={context.processingMessage}
                spinnerFrame={context.spinnerFrame}
            />
            {program.render()}
            <SystemLog logs={context.systemLog} displayCount={4} />
        </Box>
    );
}
