// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {float32} from "../primitives/float";

/**
 * A single-precision float that marshals to `0` when null.
 */
export class ZeroFloat32 extends ZeroValue<number> {
    readonly kind = "Float32" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(float32, value, valid);
    }

    static from(value: number): ZeroFloat32 {
        return new ZeroFloat32(value, Math.fround(value) !== 0);
    }

    static fromPointer(ref: number | null | undefined): ZeroFloat32 {
        if (ref === null || ref === undefined) {
            return new ZeroFloat32();
        }
        return ZeroFloat32.from(ref);
    }
}
