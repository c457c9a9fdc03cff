import { describe, it, expect } from 'vitest';
import { checkField, cleanPaste, FormModel, REQUIRED_MESSAGE, type FieldSpec } from './form-model.js';
import { keyMessage } from '../engine/messages.js';

const FIELDS: readonly FieldSpec[] = [
    { key: 'name', label: 'Name', kind: 'text', required: true, minLength: 2 },
    { key: 'kind', label: 'Kind', kind: 'select', options: ['a', 'b', 'c'] },
    { key: 'port', label: 'Port', kind: 'number', maxLength: 5 },
];

function press(form: FormModel, ...labels: string[]) {
    return labels.map((label) => form.handleKey(keyMessage(label).key));
}

describe('cleanPaste', () => {
    it('keeps a single line', () => {
        expect(cleanPaste('a\tb\r\nc\u0007')).toBe('a bc');
    });
});

describe('checkField', () => {
    it('checks required, minimum length and kind in that order', () => {
        const email: FieldSpec = { key: 'e', label: 'E', kind: 'email', minLength: 3 };
        expect(checkField(email, '')).toBeNull();
        expect(checkField(email, 'ab')).toBe('Minimum length is 3 characters');
        expect(checkField(email, 'abc')).toBe('invalid email address');
        expect(checkField({ ...email, required: true }, '  ')).toBe(REQUIRED_MESSAGE);
    });
});

describe('FormModel', () => {
    it('starts with defaults and the first select option', () => {
        const form = new FormModel('Test', FIELDS);
        expect(form.values()).toEqual({ name: '', kind: 'a', port: '' });
        expect(form.focusIndex).toBe(0);
    });

    it('edits text at the cursor', () => {
        const form = new FormModel('Test', FIELDS);
        press(form, 'a', 'b', 'left', 'x');
        expect(form.value('name')).toBe('axb');
        expect(form.cursor).toBe(2);

        press(form, 'backspace');
        expect(form.value('name')).toBe('ab');
        expect(form.cursor).toBe(1);

        press(form, 'home', 'delete');
        expect(form.value('name')).toBe('b');

        press(form, 'space', 'end', 'z');
        expect(form.value('name')).toBe(' bz');
    });

    it('validates the focused field on enter', () => {
        const form = new FormModel('Test', FIELDS);
        expect(press(form, 'enter')).toEqual(['none']);
        expect(form.error('name')).toBe(REQUIRED_MESSAGE);

        press(form, 'q', 'enter');
        expect(form.error('name')).toBe('Minimum length is 2 characters');
        expect(form.focusIndex).toBe(0);

        press(form, 'q');
        expect(form.error('name')).toBeUndefined();
        press(form, 'enter');
        expect(form.focusIndex).toBe(1);
    });

    it('cycles select options with space and arrows', () => {
        const form = new FormModel('Test', FIELDS);
        press(form, 'tab', 'space');
        expect(form.value('kind')).toBe('b');
        press(form, 'left', 'left');
        expect(form.value('kind')).toBe('c');
        press(form, 'right');
        expect(form.value('kind')).toBe('a');
    });

    it('keeps digits only in number fields and respects the maximum length', () => {
        const form = new FormModel('Test', FIELDS);
        press(form, 'down', 'down', 'ab12\n3');
        expect(form.value('port')).toBe('123');
        press(form, '4', '5', '6');
        expect(form.value('port')).toBe('12345');
    });

    it('does not move focus past either end', () => {
        const form = new FormModel('Test', FIELDS);
        press(form, 'shift+tab');
        expect(form.focusIndex).toBe(0);
        press(form, 'tab', 'tab', 'tab');
        expect(form.focusIndex).toBe(2);
    });

    it('submits from the last field once everything is valid', () => {
        const form = new FormModel('Test', FIELDS);
        press(form, 'o', 'k', 'enter', 'enter');
        expect(press(form, 'enter')).toEqual(['submit']);
    });

    it('moves focus to the first invalid field on ctrl+s', () => {
        const form = new FormModel('Test', FIELDS);
        press(form, 'tab', 'tab');
        expect(press(form, 'ctrl+s')).toEqual(['none']);
        expect(form.focusIndex).toBe(0);
        expect(form.error('name')).toBe(REQUIRED_MESSAGE);
    });

    it('toggles help and cancels', () => {
        const form = new FormModel('Test', FIELDS);
        press(form, 'ctrl+h');
        expect(form.showHelp).toBe(true);
        expect(press(form, 'esc')).toEqual(['cancel']);
    });

    it('clears values and errors on reset', () => {
        const form = new FormModel('Test', FIELDS);
        form.setValue('name', 'shop');
        form.setError('name', 'already exists');
        expect(form.error('name')).toBe('already exists');
        form.reset();
        expect(form.values()).toEqual({ name: '', kind: 'a', port: '' });
        expect(form.error('name')).toBeUndefined();
    });
});
