/**
 * @srvdeck/tui — Form View
 *
 * One instance per form screen. Editing is delegated to FormModel; on
 * submit the form definition turns the values into a command plan,
 * which is handed to the controller as a queue request. A plan that
 * cannot be built leaves the operator on the form with the reason.
 */

import React from 'react';
import { Box, Text } from 'ink';
import {
    BaseView,
    Effects,
    FORM_DEFINITIONS,
    FormModel,
    navigateBack,
    type Effect,
    type FieldSpec,
    type FormDefinition,
    type FormState,
    type Message,
    type NavigationPayload,
    type SharedContext,
} from '@srvdeck/core';
import { errorMessage } from '@srvdeck/shared';

const HELP_LINES = [
    'Tab/↓ next field · Shift+Tab/↑ previous field',
    '←/→ move cursor or change option · Home/End jump',
    'Enter next field (submits on the last) · Ctrl+S submit · Esc back',
];

export class FormView extends BaseView<React.ReactElement> {
    readonly model: FormModel;
    private readonly definition: FormDefinition;
    private problem: string | undefined = undefined;

    constructor(
        state: FormState,
        private readonly context: SharedContext,
        private readonly now: () => Date = () => new Date(),
    ) {
        super();
        this.definition = FORM_DEFINITIONS[state];
        this.model = new FormModel(this.definition.title, this.definition.fields);
    }

    /** Error from the last submit, if it could not be planned */
    get submitError(): string | undefined {
        return this.problem;
    }

    /** Fresh form on every forward navigation; coming back keeps the values. */
    override initialize(_payload: NavigationPayload | undefined): void {
        this.model.reset();
        this.problem = undefined;
    }

    update(message: Message): Effect {
        if (message.type !== 'key') return Effects.none();

        switch (this.model.handleKey(message.key)) {
            case 'cancel':
                return Effects.message(navigateBack());
            case 'submit':
                return this.submit();
            case 'none':
                return Effects.none();
        }
    }

    private submit(): Effect {
        try {
            const plan = this.definition.plan(this.model.values(), {
                os: this.context.os,
                config: this.context.config,
                now: this.now(),
            });
            this.problem = undefined;
            return Effects.message({ type: 'queue-requested', label: plan.label, commands: plan.commands });
        } catch (err) {
            this.problem = errorMessage(err);
            return Effects.none();
        }
    }

    // ─── Render ───────────────────────────────────────────────────

    private display(field: FieldSpec, focused: boolean): string {
        const value = this.model.value(field.key);
        if (field.kind === 'select') return focused ? `◀ ${value} ▶` : value;
        const shown = field.kind === 'password' ? '•'.repeat(value.length) : value;
        if (!focused) return shown === '' ? (field.placeholder ?? '') : shown;
        const cursor = this.model.cursor;
        return `${shown.slice(0, cursor)}▊${shown.slice(cursor)}`;
    }

    render(): React.ReactElement {
        return (
            <Box flexDirection="column" borderStyle="round" borderColor="green" paddingX={1}>
                <Text bold color="green">{this.model.title}</Text>
                <Text> </Text>
                {this.model.fields.map((field, i) => {
                    const focused = i === this.model.focusIndex;
                    const error = this.model.error(field.key);
                    const empty = this.model.value(field.key) === '' && !focused;
                    return (
                        <Box key={field.key} flexDirection="column">
                            <Text>
                                <Text color={focused ? 'yellow' : 'gray'}>{focused ? '> ' : '  '}</Text>
                                <Text bold={focused}>{field.label}{field.required ? ' *' : ''}: </Text>
                                <Text color={empty ? 'gray' : 'white'} dimColor={empty}>{this.display(field, focused)}</Text>
                            </Text>
                            {error !== undefined && <Text color="red">    ❌ {error}</Text>}
                        </Box>
                    );
                })}
                {this.problem !== undefined && (
                    <>
                        <Text> </Text>
                        <Text color="red" bold>❌ {this.problem}</Text>
                    </>
                )}
                <Text> </Text>
                {this.model.showHelp ? (
                    HELP_LINES.map((line) => (
                        <Text key={line} color="gray" dimColor>{line}</Text>
                    ))
                ) : (
                    <Text color="gray" dimColor>Ctrl+S submit · Esc back · Ctrl+H help</Text>
                )}
            </Box>
        );
    }
}
