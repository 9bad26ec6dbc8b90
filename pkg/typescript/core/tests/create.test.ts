/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

import {describe, expect, it} from 'vitest';
import {create} from '../src/create';
import {isKind, KINDS} from '../src/type';
import {NullInt32} from '../src/null';
import {ZeroString} from '../src/zero';

describe('create', () => {
    it('should create a wrapper of the requested class', () => {
        expect(create('null', 'Int32')).toBeInstanceOf(NullInt32);
        expect(create('zero', 'String')).toBeInstanceOf(ZeroString);
    });

    it('should create invalid wrappers for every kind and family', () => {
        for (const family of ['null', 'zero'] as const) {
            for (const kind of KINDS) {
                const wrapper = create(family, kind);
                expect(wrapper.kind).toBe(kind);
                expect(wrapper.family).toBe(family);
                expect(wrapper.valid).toBe(false);
            }
        }
    });

    it('should type the wrapper by family and kind', () => {
        const wrapper = create('null', 'Int64');
        wrapper.unmarshalJSON('9223372036854775807');
        const value: bigint = wrapper.value;
        expect(value).toBe(BigInt('9223372036854775807'));
    });

    it('should return a wrapper ready to decode into', () => {
        const wrapper = create('zero', 'String');
        wrapper.unmarshalJSON('"x"');
        expect(wrapper.value).toBe('x');
        expect(wrapper.valid).toBe(true);
    });
});

describe('isKind', () => {
    it('should recognise kind names exactly', () => {
        expect(isKind('Int32')).toBe(true);
        expect(isKind('int32')).toBe(false);
        expect(isKind('Decimal')).toBe(false);
    });
});
