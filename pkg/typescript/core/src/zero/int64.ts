// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {int64} from "../primitives/integer";

/**
 * A 64-bit signed integer, held as a `bigint`, that marshals to `0` when null.
 */
export class ZeroInt64 extends ZeroValue<bigint> {
    readonly kind = "Int64" as const;

    constructor(value: bigint = BigInt(0), valid: boolean = false) {
        super(int64, value, valid);
    }

    /**
     * Invalid if `value` is the zero value.
     */
    static from(value: bigint): ZeroInt64 {
        return new ZeroInt64(value, !int64.isZero(value));
    }

    /**
     * Invalid if `ref` is null, undefined or the zero value.
     */
    static fromPointer(ref: bigint | null | undefined): ZeroInt64 {
        if (ref === null || ref === undefined) {
            return new ZeroInt64();
        }
        return ZeroInt64.from(ref);
    }
}
