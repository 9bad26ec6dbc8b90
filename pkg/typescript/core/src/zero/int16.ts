// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {int16} from "../primitives/integer";

/**
 * A 16-bit signed integer where 0 and null are the same value.
 */
export class ZeroInt16 extends ZeroValue<number> {
    readonly kind = "Int16" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(int16, value, valid);
    }

    static from(value: number): ZeroInt16 {
        return new ZeroInt16(value, !int16.isZero(value));
    }

    static fromPointer(ref: number | null | undefined): ZeroInt16 {
        if (ref === null || ref === undefined) {
            return new ZeroInt16();
        }
        return ZeroInt16.from(ref);
    }
}
