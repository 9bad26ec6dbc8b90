/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

import {describe, expect, it} from 'vitest';
import {ZeroInt32} from '../../src/zero/int32';
import {OverflowError, ParseError, TypeMismatchError} from '../../src/errors';

describe('ZeroInt32', () => {
    describe('constructor', () => {
        it('should default to an invalid zero', () => {
            const i = new ZeroInt32();
            expect(i.value).toBe(0);
            expect(i.valid).toBe(false);
            expect(i.family).toBe('zero');
        });
    });

    describe('from', () => {
        it('should create valid value', () => {
            const i = ZeroInt32.from(12345);
            expect(i.value).toBe(12345);
            expect(i.valid).toBe(true);
        });

        it('should treat zero as invalid', () => {
            expect(ZeroInt32.from(0).valid).toBe(false);
        });
    });

    describe('fromPointer', () => {
        it('should treat null and zero as invalid', () => {
            expect(ZeroInt32.fromPointer(null).valid).toBe(false);
            expect(ZeroInt32.fromPointer(0).valid).toBe(false);
            expect(ZeroInt32.fromPointer(7).valid).toBe(true);
        });
    });

    describe('unmarshalJSON', () => {
        it('should decode a number', () => {
            const i = new ZeroInt32();
            i.unmarshalJSON('12345');
            expect(i.value).toBe(12345);
            expect(i.valid).toBe(true);
        });

        it('should decode zero as invalid', () => {
            const i = ZeroInt32.from(5);
            i.unmarshalJSON('0');
            expect(i.value).toBe(0);
            expect(i.valid).toBe(false);
        });

        it('should decode a quoted zero as invalid', () => {
            const i = ZeroInt32.from(5);
            i.unmarshalJSON('"0"');
            expect(i.valid).toBe(false);
        });

        it('should decode null and an empty string as invalid', () => {
            const i = ZeroInt32.from(5);
            i.unmarshalJSON('null');
            expect(i.valid).toBe(false);
            i.setValid(5);
            i.unmarshalJSON('""');
            expect(i.valid).toBe(false);
        });

        it('should reject an object', () => {
            expect(() => new ZeroInt32().unmarshalJSON('{"Int32":12345,"Valid":true}')).toThrow(TypeMismatchError);
        });

        it('should fail on overflow', () => {
            const i = new ZeroInt32();
            i.unmarshalJSON('2147483647');
            expect(i.value).toBe(2147483647);
            expect(() => i.unmarshalJSON('2147483648')).toThrow(OverflowError);
            expect(i.valid).toBe(false);
        });
    });

    describe('marshalJSON', () => {
        it('should encode valid value', () => {
            expect(ZeroInt32.from(12345).marshalJSON()).toBe('12345');
        });

        it('should encode invalid value as zero', () => {
            expect(new ZeroInt32().marshalJSON()).toBe('0');
            expect(new ZeroInt32(5, false).marshalJSON()).toBe('0');
            expect(JSON.stringify({a: new ZeroInt32()})).toBe('{"a":0}');
        });
    });

    describe('unmarshalText', () => {
        it('should decode a number', () => {
            const i = new ZeroInt32();
            i.unmarshalText('12345');
            expect(i.value).toBe(12345);
            expect(i.valid).toBe(true);
        });

        it('should decode zero, empty text and null as invalid', () => {
            const i = new ZeroInt32();
            for (const text of ['0', '', 'null']) {
                i.setValid(1);
                i.unmarshalText(text);
                expect(i.valid).toBe(false);
            }
        });

        it('should fail on garbage', () => {
            expect(() => new ZeroInt32().unmarshalText('abc')).toThrow(ParseError);
        });
    });

    describe('marshalText', () => {
        it('should encode invalid value as zero', () => {
            expect(new ZeroInt32().marshalText()).toBe('0');
            expect(ZeroInt32.from(-3).marshalText()).toBe('-3');
        });
    });

    describe('scan', () => {
        it('should scan a number', () => {
            const i = new ZeroInt32();
            i.scan(5);
            expect(i.value).toBe(5);
            expect(i.valid).toBe(true);
        });

        it('should scan zero and null as invalid', () => {
            const i = ZeroInt32.from(5);
            i.scan(0);
            expect(i.valid).toBe(false);
            i.setValid(5);
            i.scan(null);
            expect(i.valid).toBe(false);
        });
    });

    describe('driverValue', () => {
        it('should return the number', () => {
            expect(ZeroInt32.from(5).driverValue()).toBe(5);
        });

        it('should return null for invalid and zero values', () => {
            expect(new ZeroInt32(5, false).driverValue()).toBeNull();
            expect(new ZeroInt32(0, true).driverValue()).toBeNull();
        });
    });

    describe('isZero', () => {
        it('should consider invalid and zero values zero', () => {
            expect(new ZeroInt32().isZero()).toBe(true);
            expect(new ZeroInt32(0, true).isZero()).toBe(true);
            expect(ZeroInt32.from(1).isZero()).toBe(false);
        });
    });

    describe('equal', () => {
        it('should treat null and zero as equal', () => {
            expect(new ZeroInt32(0, true).equal(new ZeroInt32(0, false))).toBe(true);
            expect(new ZeroInt32(10, false).equal(new ZeroInt32(0, true))).toBe(true);
            expect(new ZeroInt32(10, false).equal(new ZeroInt32(20, false))).toBe(true);
        });

        it('should compare valid values', () => {
            expect(ZeroInt32.from(10).equal(ZeroInt32.from(10))).toBe(true);
            expect(ZeroInt32.from(10).equal(ZeroInt32.from(20))).toBe(false);
            expect(ZeroInt32.from(10).equal(new ZeroInt32(10, false))).toBe(false);
        });
    });

    describe('valueOrZero', () => {
        it('should return zero when invalid', () => {
            expect(new ZeroInt32(12345, false).valueOrZero()).toBe(0);
            expect(new ZeroInt32(12345, true).valueOrZero()).toBe(12345);
        });
    });
});
