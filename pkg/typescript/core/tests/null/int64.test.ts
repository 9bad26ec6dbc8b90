/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

import {describe, expect, it} from 'vitest';
import {NullInt64} from '../../src/null/int64';
import {BindingTypeError, OverflowError, TypeMismatchError} from '../../src/errors';

const MAX = BigInt('9223372036854775807');
const MIN = BigInt('-9223372036854775808');

describe('NullInt64', () => {
    describe('constructor', () => {
        it('should default to an invalid zero', () => {
            const i = new NullInt64();
            expect(i.value).toBe(BigInt(0));
            expect(i.valid).toBe(false);
        });

        it('should reject a value above the maximum', () => {
            expect(() => new NullInt64(MAX + BigInt(1), true)).toThrow(OverflowError);
        });

        it('should leave the wrapper untouched when setValid fails', () => {
            const i = NullInt64.from(BigInt(5));
            expect(() => i.setValid(MIN - BigInt(1))).toThrow(OverflowError);
            expect(i.value).toBe(BigInt(5));
            expect(i.valid).toBe(true);
        });
    });

    describe('unmarshalJSON', () => {
        it('should keep full precision at the maximum', () => {
            const i = new NullInt64();
            i.unmarshalJSON('9223372036854775807');
            expect(i.value).toBe(MAX);
            expect(i.valid).toBe(true);
        });

        it('should decode the quoted minimum', () => {
            const i = new NullInt64();
            i.unmarshalJSON('"-9223372036854775808"');
            expect(i.value).toBe(MIN);
        });

        it('should fail on overflow', () => {
            const i = NullInt64.from(BigInt(1));
            expect(() => i.unmarshalJSON('9223372036854775808')).toThrow(OverflowError);
            expect(i.value).toBe(BigInt(0));
            expect(i.valid).toBe(false);
        });

        it('should reject an exponent literal', () => {
            expect(() => new NullInt64().unmarshalJSON('1e3')).toThrow(TypeMismatchError);
        });

        it('should decode quoted null as invalid', () => {
            const i = NullInt64.from(BigInt(1));
            i.unmarshalJSON('"null"');
            expect(i.valid).toBe(false);
        });
    });

    describe('marshalJSON', () => {
        it('should write the full literal', () => {
            expect(NullInt64.from(MAX).marshalJSON()).toBe('9223372036854775807');
            expect(NullInt64.from(MIN).marshalJSON()).toBe('-9223372036854775808');
        });

        it('should encode invalid value as null', () => {
            expect(new NullInt64().marshalJSON()).toBe('null');
        });
    });

    describe('toJSON', () => {
        it('should return a number when it is safe', () => {
            expect(NullInt64.from(BigInt(42)).toJSON()).toBe(42);
        });

        it('should return a decimal string beyond the safe range', () => {
            expect(NullInt64.from(MAX).toJSON()).toBe('9223372036854775807');
            expect(JSON.stringify({id: NullInt64.from(MAX)})).toBe('{"id":"9223372036854775807"}');
        });
    });

    describe('unmarshalText', () => {
        it('should decode a negative number', () => {
            const i = new NullInt64();
            i.unmarshalText('-42');
            expect(i.value).toBe(BigInt(-42));
            expect(i.marshalText()).toBe('-42');
        });
    });

    describe('scan', () => {
        it('should scan a bigint, a number and a decimal string', () => {
            const i = new NullInt64();
            i.scan(BigInt(7));
            expect(i.value).toBe(BigInt(7));
            i.scan(42);
            expect(i.value).toBe(BigInt(42));
            i.scan('9007199254740993');
            expect(i.value).toBe(BigInt('9007199254740993'));
            expect(i.valid).toBe(true);
        });

        it('should reject a fractional number', () => {
            expect(() => new NullInt64().scan(1.5)).toThrow(BindingTypeError);
        });

        it('should reject a non-numeric string', () => {
            expect(() => new NullInt64().scan('abc')).toThrow('Cannot scan string into Int64');
        });
    });

    describe('driverValue', () => {
        it('should return the bigint', () => {
            expect(NullInt64.from(MIN).driverValue()).toBe(MIN);
        });
    });

    describe('equal', () => {
        it('should compare by value', () => {
            expect(NullInt64.from(BigInt(5)).equal(NullInt64.from(BigInt(5)))).toBe(true);
            expect(NullInt64.from(BigInt(5)).equal(NullInt64.from(BigInt(6)))).toBe(false);
            expect(NullInt64.from(BigInt(0)).equal(new NullInt64())).toBe(false);
        });
    });
});
