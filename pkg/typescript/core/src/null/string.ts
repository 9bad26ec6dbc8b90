// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {string} from "../primitives/string";

/**
 * A nullable string. It marshals to JSON `null` if invalid.
 */
export class NullString extends NullValue<string> {
    readonly kind = "String" as const;

    constructor(value: string = "", valid: boolean = false) {
        super(string, value, valid);
    }

    /**
     * Always valid, even for the zero value.
     */
    static from(value: string): NullString {
        return new NullString(value, true);
    }

    /**
     * Invalid if `ref` is null or undefined.
     */
    static fromPointer(ref: string | null | undefined): NullString {
        if (ref === null || ref === undefined) {
            return new NullString();
        }
        return NullString.from(ref);
    }
}
