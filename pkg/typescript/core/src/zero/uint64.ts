// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {uint64} from "../primitives/integer";

/**
 * A 64-bit unsigned integer where 0 and null are the same value.
 */
export class ZeroUint64 extends ZeroValue<bigint> {
    readonly kind = "Uint64" as const;

    constructor(value: bigint = BigInt(0), valid: boolean = false) {
        super(uint64, value, valid);
    }

    static from(value: bigint): ZeroUint64 {
        return new ZeroUint64(value, !uint64.isZero(value));
    }

    static fromPointer(ref: bigint | null | undefined): ZeroUint64 {
        if (ref === null || ref === undefined) {
            return new ZeroUint64();
        }
        return ZeroUint64.from(ref);
    }
}
