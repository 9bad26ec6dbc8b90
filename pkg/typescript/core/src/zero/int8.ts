// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {int8} from "../primitives/integer";

/**
 * An 8-bit signed integer that marshals to `0` when null, and is null to a driver when 0.
 */
export class ZeroInt8 extends ZeroValue<number> {
    readonly kind = "Int8" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(int8, value, valid);
    }

    static from(value: number): ZeroInt8 {
        return new ZeroInt8(value, !int8.isZero(value));
    }

    static fromPointer(ref: number | null | undefined): ZeroInt8 {
        if (ref === null || ref === undefined) {
            return new ZeroInt8();
        }
        return ZeroInt8.from(ref);
    }
}
