/**
 * @srvdeck/core — Form Model
 *
 * Field editing for the form screens, independent of how they are drawn:
 * focus, cursor, select cycling, paste cleaning and validation. The view
 * feeds it key presses and acts on the returned outcome.
 */

import { isPaste, keyLabel, type KeyPress } from '../engine/messages.js';
import { validateEmail, validateUrl, type FieldValidator } from './validation.js';

// ─── Types ────────────────────────────────────────────────────────

export const FIELD_KINDS = ['text', 'password', 'number', 'select', 'email', 'url'] as const;
export type FieldKind = (typeof FIELD_KINDS)[number];

export interface FieldSpec {
    readonly key: string;
    readonly label: string;
    readonly kind: FieldKind;
    readonly required?: boolean;
    readonly minLength?: number;
    readonly maxLength?: number;
    readonly placeholder?: string;
    /** Select fields only; the first option is the default */
    readonly options?: readonly string[];
    readonly defaultValue?: string;
    /** Runs after the required/minimum-length checks, only on non-empty values */
    readonly validate?: FieldValidator;
}

export type FormValues = Readonly<Record<string, string>>;

/** What the view should do after a key press. */
export type FormOutcome = 'none' | 'submit' | 'cancel';

export const REQUIRED_MESSAGE = 'This field is required';

export function minLengthMessage(min: number): string {
    return `Minimum length is ${min} characters`;
}

/** Single-line text from a paste: newlines dropped, tabs to spaces, other control characters removed. */
export function cleanPaste(text: string): string {
    return text
        .replace(/[\r\n]/g, '')
        .replace(/\t/g, ' ')
        .replace(/[\u0000-\u001f\u007f]/g, '');
}

function defaultFor(field: FieldSpec): string {
    if (field.defaultValue !== undefined) return field.defaultValue;
    if (field.kind === 'select') return field.options?.[0] ?? '';
    return '';
}

function kindValidator(kind: FieldKind): FieldValidator | undefined {
    if (kind === 'email') return validateEmail;
    if (kind === 'url') return validateUrl;
    return undefined;
}

/** Error for one value, or null when it is acceptable. */
export function checkField(field: FieldSpec, value: string): string | null {
    if (value.trim() === '') {
        return field.required ? REQUIRED_MESSAGE : null;
    }
    if (field.minLength !== undefined && value.length < field.minLength) {
        return minLengthMessage(field.minLength);
    }
    const validate = field.validate ?? kindValidator(field.kind);
    return validate ? validate(value) : null;
}

// ─── Model ────────────────────────────────────────────────────────

export class FormModel {
    private readonly fieldValues = new Map<string, string>();
    private readonly errors = new Map<string, string>();
    private focus = 0;
    private cursorPos = 0;
    private help = false;

    constructor(
        readonly title: string,
        readonly fields: readonly FieldSpec[],
    ) {
        this.reset();
    }

    get focusIndex(): number {
        return this.focus;
    }

    get focused(): FieldSpec | undefined {
        return this.fields[this.focus];
    }

    get cursor(): number {
        return this.cursorPos;
    }

    get showHelp(): boolean {
        return this.help;
    }

    value(key: string): string {
        return this.fieldValues.get(key) ?? '';
    }

    values(): FormValues {
        return Object.fromEntries(this.fields.map((field) => [field.key, this.value(field.key)]));
    }

    error(key: string): string | undefined {
        return this.errors.get(key);
    }

    setValue(key: string, value: string): void {
        this.fieldValues.set(key, value);
        this.errors.delete(key);
        if (this.focused?.key === key) this.cursorPos = value.length;
    }

    /** Report an error that only surfaced after submit (e.g. from the provider). */
    setError(key: string, message: string): void {
        this.errors.set(key, message);
    }

    reset(): void {
        this.fieldValues.clear();
        this.errors.clear();
        for (const field of this.fields) this.fieldValues.set(field.key, defaultFor(field));
        this.focus = 0;
        this.help = false;
        this.cursorPos = this.value(this.focused?.key ?? '').length;
    }

    // ─── Validation ───────────────────────────────────────────────

    validateField(index: number): boolean {
        const field = this.fields[index];
        if (field === undefined) return true;
        const problem = checkField(field, this.value(field.key));
        if (problem === null) {
            this.errors.delete(field.key);
            return true;
        }
        this.errors.set(field.key, problem);
        return false;
    }

    /** Validates every field; focus moves to the first invalid one. */
    validateAll(): boolean {
        let firstInvalid = -1;
        this.fields.forEach((_, i) => {
            if (!this.validateField(i) && firstInvalid < 0) firstInvalid = i;
        });
        if (firstInvalid >= 0) this.moveFocus(firstInvalid);
        return firstInvalid < 0;
    }

    // ─── Keys ─────────────────────────────────────────────────────

    handleKey(key: KeyPress): FormOutcome {
        const field = this.focused;
        if (field === undefined) return 'none';

        if (isPaste(key)) {
            this.paste(field, key.input);
            return 'none';
        }

        switch (keyLabel(key)) {
            case 'esc':
                return 'cancel';
            case 'ctrl+s':
                return this.validateAll() ? 'submit' : 'none';
            case 'ctrl+h':
                this.help = !this.help;
                return 'none';
            case 'enter':
                return this.enter();
            case 'tab':
            case 'down':
                this.moveFocus(this.focus + 1);
                return 'none';
            case 'shift+tab':
            case 'up':
                this.moveFocus(this.focus - 1);
                return 'none';
            case 'left':
                if (field.kind === 'select') this.cycle(field, -1);
                else this.cursorPos = Math.max(0, this.cursorPos - 1);
                return 'none';
            case 'right':
                if (field.kind === 'select') this.cycle(field, 1);
                else this.cursorPos = Math.min(this.value(field.key).length, this.cursorPos + 1);
                return 'none';
            case 'home':
                this.cursorPos = 0;
                return 'none';
            case 'end':
                this.cursorPos = this.value(field.key).length;
                return 'none';
            case 'backspace':
                this.backspace(field);
                return 'none';
            case 'delete':
                this.deleteForward(field);
                return 'none';
            case 'space':
                if (field.kind === 'select') this.cycle(field, 1);
                else this.insert(field, ' ');
                return 'none';
            default:
                if (!key.ctrl && !key.meta && key.name === undefined && key.input.length === 1) {
                    this.insert(field, key.input);
                }
                return 'none';
        }
    }

    private enter(): FormOutcome {
        if (!this.validateField(this.focus)) return 'none';
        if (this.focus < this.fields.length - 1) {
            this.moveFocus(this.focus + 1);
            return 'none';
        }
        return this.validateAll() ? 'submit' : 'none';
    }

    private moveFocus(index: number): void {
        if (index < 0 || index >= this.fields.length) return;
        this.focus = index;
        this.cursorPos = this.value(this.focused?.key ?? '').length;
    }

    private cycle(field: FieldSpec, step: 1 | -1): void {
        const options = field.options ?? [];
        if (options.length === 0) return;
        const current = options.indexOf(this.value(field.key));
        const next = current < 0 ? (step > 0 ? 0 : options.length - 1) : (current + step + options.length) % options.length;
        this.fieldValues.set(field.key, options[next] ?? '');
        this.errors.delete(field.key);
    }

    private insert(field: FieldSpec, text: string): void {
        if (field.kind === 'select') return;
        const accepted = field.kind === 'number' ? text.replace(/\D/g, '') : text;
        const value = this.value(field.key);
        const room = field.maxLength !== undefined ? field.maxLength - value.length : accepted.length;
        const chunk = accepted.slice(0, Math.max(0, room));
        if (chunk === '') return;
        this.fieldValues.set(field.key, value.slice(0, this.cursorPos) + chunk + value.slice(this.cursorPos));
        this.cursorPos += chunk.length;
        this.errors.delete(field.key);
    }

    private paste(field: FieldSpec, text: string): void {
        this.insert(field, cleanPaste(text));
    }

    private backspace(field: FieldSpec): void {
        if (field.kind === 'select' || this.cursorPos === 0) return;
        const value = this.value(field.key);
        this.fieldValues.set(field.key, value.slice(0, this.cursorPos - 1) + value.slice(this.cursorPos));
        this.cursorPos -= 1;
    }

    private deleteForward(field: FieldSpec): void {
        const value = this.value(field.key);
        if (field.kind === 'select' || this.cursorPos >= value.length) return;
        this.fieldValues.set(field.key, value.slice(0, this.cursorPos) + value.slice(this.cursorPos + 1));
    }
}
