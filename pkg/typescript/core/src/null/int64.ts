// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {int64} from "../primitives/integer";

/**
 * A nullable 64-bit signed integer, held as a `bigint`.
 */
export class NullInt64 extends NullValue<bigint> {
    readonly kind = "Int64" as const;

    constructor(value: bigint = BigInt(0), valid: boolean = false) {
        super(int64, value, valid);
    }

    /**
     * Always valid, even for the zero value.
     */
    static from(value: bigint): NullInt64 {
        return new NullInt64(value, true);
    }

    static fromPointer(ref: bigint | null | undefined): NullInt64 {
        if (ref === null || ref === undefined) {
            return new NullInt64();
        }
        return NullInt64.from(ref);
    }
}
