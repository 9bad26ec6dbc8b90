/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

import {describe, expect, it} from 'vitest';
import {NullString} from '../../src/null/string';
import {BindingTypeError} from '../../src/errors';

describe('NullString', () => {
    describe('from', () => {
        it('should keep the empty string valid', () => {
            const s = NullString.from('');
            expect(s.valid).toBe(true);
            expect(s.marshalJSON()).toBe('""');
        });
    });

    describe('unmarshalJSON', () => {
        it('should decode a string', () => {
            const s = new NullString();
            s.unmarshalJSON('"test"');
            expect(s.value).toBe('test');
            expect(s.valid).toBe(true);
        });

        it('should decode an empty string as valid', () => {
            const s = new NullString();
            s.unmarshalJSON('""');
            expect(s.value).toBe('');
            expect(s.valid).toBe(true);
        });

        it('should keep a quoted null as text', () => {
            const s = new NullString();
            s.unmarshalJSON('"null"');
            expect(s.value).toBe('null');
            expect(s.valid).toBe(true);
        });

        it('should decode null as invalid', () => {
            const s = NullString.from('x');
            s.unmarshalJSON('null');
            expect(s.value).toBe('');
            expect(s.valid).toBe(false);
        });

        it('should reject a number', () => {
            expect(() => new NullString().unmarshalJSON('1')).toThrow('Cannot unmarshal number into String');
        });
    });

    describe('marshalJSON', () => {
        it('should escape the value', () => {
            expect(NullString.from('a "b"').marshalJSON()).toBe('"a \\"b\\""');
        });

        it('should encode invalid value as null', () => {
            expect(new NullString('hidden', false).marshalJSON()).toBe('null');
        });
    });

    describe('unmarshalText', () => {
        it('should decode text verbatim', () => {
            const s = new NullString();
            s.unmarshalText(' test ');
            expect(s.value).toBe(' test ');
            expect(s.valid).toBe(true);
        });

        it('should decode empty text and null as invalid', () => {
            const s = NullString.from('x');
            s.unmarshalText('');
            expect(s.valid).toBe(false);
            s.setValid('y');
            s.unmarshalText('null');
            expect(s.valid).toBe(false);
        });
    });

    describe('scan', () => {
        it('should scan a string', () => {
            const s = new NullString();
            s.scan('test');
            expect(s.value).toBe('test');
            expect(s.valid).toBe(true);
        });

        it('should decode bytes as UTF-8', () => {
            const s = new NullString();
            s.scan(new TextEncoder().encode('héllo'));
            expect(s.value).toBe('héllo');
        });

        it('should reject a number', () => {
            expect(() => new NullString().scan(1)).toThrow(BindingTypeError);
        });

        it('should reject bytes that are not UTF-8 and stay invalid', () => {
            const s = NullString.from('x');
            expect(() => s.scan(new Uint8Array([0x66, 0xff, 0x6f])))
                .toThrow('Cannot scan invalid UTF-8 bytes into String');
            expect(s.value).toBe('');
            expect(s.valid).toBe(false);
        });
    });

    describe('equal', () => {
        it('should distinguish empty from null', () => {
            expect(NullString.from('').equal(new NullString())).toBe(false);
            expect(NullString.from('a').equal(NullString.from('a'))).toBe(true);
        });
    });
});
