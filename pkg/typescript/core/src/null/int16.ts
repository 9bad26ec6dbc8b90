// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {int16} from "../primitives/integer";

/**
 * A nullable 16-bit signed integer.
 */
export class NullInt16 extends NullValue<number> {
    readonly kind = "Int16" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(int16, value, valid);
    }

    static from(value: number): NullInt16 {
        return new NullInt16(value, true);
    }

    static fromPointer(ref: number | null | undefined): NullInt16 {
        if (ref === null || ref === undefined) {
            return new NullInt16();
        }
        return NullInt16.from(ref);
    }
}
