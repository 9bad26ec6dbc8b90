// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {bool} from "../primitives/bool";

/**
 * A nullable boolean.
 */
export class NullBool extends NullValue<boolean> {
    readonly kind = "Bool" as const;

    constructor(value: boolean = false, valid: boolean = false) {
        super(bool, value, valid);
    }

    /**
     * Always valid, even for the zero value.
     */
    static from(value: boolean): NullBool {
        return new NullBool(value, true);
    }

    static fromPointer(ref: boolean | null | undefined): NullBool {
        if (ref === null || ref === undefined) {
            return new NullBool();
        }
        return NullBool.from(ref);
    }
}
