// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {float64} from "../primitives/float";

/**
 * A nullable double-precision float. It marshals to JSON `null` if invalid.
 */
export class NullFloat64 extends NullValue<number> {
    readonly kind = "Float64" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(float64, value, valid);
    }

    static from(value: number): NullFloat64 {
        return new NullFloat64(value, true);
    }

    /**
     * Invalid if `ref` is null or undefined.
     */
    static fromPointer(ref: number | null | undefined): NullFloat64 {
        if (ref === null || ref === undefined) {
            return new NullFloat64();
        }
        return NullFloat64.from(ref);
    }
}
