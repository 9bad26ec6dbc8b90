// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {uint64} from "../primitives/integer";

/**
 * A nullable 64-bit unsigned integer, held as a `bigint`.
 */
export class NullUint64 extends NullValue<bigint> {
    readonly kind = "Uint64" as const;

    constructor(value: bigint = BigInt(0), valid: boolean = false) {
        super(uint64, value, valid);
    }

    static from(value: bigint): NullUint64 {
        return new NullUint64(value, true);
    }

    static fromPointer(ref: bigint | null | undefined): NullUint64 {
        if (ref === null || ref === undefined) {
            return new NullUint64();
        }
        return NullUint64.from(ref);
    }
}
