/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

import {describe, expect, it, vi} from 'vitest';
import {NullInt32, NullString, OverflowError, ZeroInt32} from '@nullwrap/core';
import {scanRow} from '../src/scan';
import {ScanError} from '../src/errors';

describe('scanRow', () => {
    it('should scan each column into its target', () => {
        const id = new NullInt32();
        const name = new NullString();
        scanRow({id: 7, name: null, extra: 'ignored'}, {id, name});
        expect(id.value).toBe(7);
        expect(id.valid).toBe(true);
        expect(name.valid).toBe(false);
    });

    it('should skip a missing column and log it', () => {
        const debug = vi.fn();
        const id = NullInt32.from(1);
        scanRow({}, {id}, {logger: {debug}});
        expect(id.value).toBe(1);
        expect(id.valid).toBe(true);
        expect(debug).toHaveBeenCalledWith('[scanRow] column "id" not present in row, skipping');
    });

    it('should fail on a missing column in strict mode', () => {
        const id = new NullInt32();
        expect(() => scanRow({}, {id}, {strict: true}))
            .toThrow('Cannot scan column "id": column not present in row');
    });

    it('should wrap a failed scan with the column name', () => {
        const count = new ZeroInt32();
        let caught: unknown;
        try {
            scanRow({count: 2 ** 40}, {count});
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ScanError);
        expect(caught instanceof ScanError && caught.column).toBe('count');
        expect(caught instanceof ScanError && caught.cause).toBeInstanceOf(OverflowError);
        expect(count.valid).toBe(false);
    });

    it('should keep the reason of the underlying error', () => {
        const name = new NullString();
        expect(() => scanRow({name: 42}, {name})).toThrow('Cannot scan column "name": Cannot scan number into String');
    });
});
