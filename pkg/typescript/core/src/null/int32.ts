// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {int32} from "../primitives/integer";

/**
 * A nullable 32-bit signed integer. It marshals to JSON `null` if invalid.
 * JSON input may be a number or a quoted decimal string.
 */
export class NullInt32 extends NullValue<number> {
    readonly kind = "Int32" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(int32, value, valid);
    }

    /**
     * Always valid, even for the zero value.
     */
    static from(value: number): NullInt32 {
        return new NullInt32(value, true);
    }

    /**
     * Invalid if `ref` is null or undefined.
     */
    static fromPointer(ref: number | null | undefined): NullInt32 {
        if (ref === null || ref === undefined) {
            return new NullInt32();
        }
        return NullInt32.from(ref);
    }
}
