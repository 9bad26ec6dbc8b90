// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {int8} from "../primitives/integer";

/**
 * A nullable 8-bit signed integer. It marshals to JSON `null` if invalid.
 */
export class NullInt8 extends NullValue<number> {
    readonly kind = "Int8" as const;

    constructor(value: number = 0, valid: boolean = false) {
        super(int8, value, valid);
    }

    static from(value: number): NullInt8 {
        return new NullInt8(value, true);
    }

    static fromPointer(ref: number | null | undefined): NullInt8 {
        if (ref === null || ref === undefined) {
            return new NullInt8();
        }
        return NullInt8.from(ref);
    }
}
