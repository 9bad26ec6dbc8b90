// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {float64} from "../primitives/float";

/**
 * A double-precision float that marshals to `0` when null, and is null to a driver when 0.
 */
export class ZeroFloat64 extends ZeroValue<number> {
    readonly kind = "Float64" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(float64, value, valid);
    }

    static from(value: number): ZeroFloat64 {
        return new ZeroFloat64(value, !float64.isZero(value));
    }

    /**
     * Invalid if `ref` is null, undefined or the zero value.
     */
    static fromPointer(ref: number | null | undefined): ZeroFloat64 {
        if (ref === null || ref === undefined) {
            return new ZeroFloat64();
        }
        return ZeroFloat64.from(ref);
    }
}
