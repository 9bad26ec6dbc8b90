// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {string} from "../primitives/string";

/**
 * A string that marshals to `""` when null, and is null to a driver when empty.
 */
export class ZeroString extends ZeroValue<string> {
    readonly kind = "String" as const;

    constructor(value: string = "", valid: boolean = false) {
        super(string, value, valid);
    }

    /**
     * Invalid if `value` is the zero value.
     */
    static from(value: string): ZeroString {
        return new ZeroString(value, !string.isZero(value));
    }

    /**
     * Invalid if `ref` is null, undefined or the zero value.
     */
    static fromPointer(ref: string | null | undefined): ZeroString {
        if (ref === null || ref === undefined) {
            return new ZeroString();
        }
        return ZeroString.from(ref);
    }
}
