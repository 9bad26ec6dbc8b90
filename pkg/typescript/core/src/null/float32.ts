// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {float32} from "../primitives/float";

/**
 * A nullable single-precision float. Values are rounded to float32 on the way in.
 */
export class NullFloat32 extends NullValue<number> {
    readonly kind = "Float32" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(float32, value, valid);
    }

    static from(value: number): NullFloat32 {
        return new NullFloat32(value, true);
    }

    static fromPointer(ref: number | null | undefined): NullFloat32 {
        if (ref === null || ref === undefined) {
            return new NullFloat32();
        }
        return NullFloat32.from(ref);
    }
}
