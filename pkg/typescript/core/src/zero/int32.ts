// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {int32} from "../primitives/integer";

/**
 * A 32-bit signed integer that marshals to `0` when null.
 * Considered null by a driver if 0.
 */
export class ZeroInt32 extends ZeroValue<number> {
    readonly kind = "Int32" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(int32, value, valid);
    }

    /**
     * Invalid if `value` is the zero value.
     */
    static from(value: number): ZeroInt32 {
        return new ZeroInt32(value, !int32.isZero(value));
    }

    /**
     * Invalid if `ref` is null, undefined or the zero value.
     */
    static fromPointer(ref: number | null | undefined): ZeroInt32 {
        if (ref === null || ref === undefined) {
            return new ZeroInt32();
        }
        return ZeroInt32.from(ref);
    }
}
