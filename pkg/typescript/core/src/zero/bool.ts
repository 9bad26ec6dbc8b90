// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {bool} from "../primitives/bool";

/**
 * A boolean that marshals to `false` when null. `false` is null to a driver.
 */
export class ZeroBool extends ZeroValue<boolean> {
    readonly kind = "Bool" as const;

    constructor(value: boolean = false, valid: boolean = false) {
        super(bool, value, valid);
    }

    /**
     * Invalid if `value` is the zero value.
     */
    static from(value: boolean): ZeroBool {
        return new ZeroBool(value, !bool.isZero(value));
    }

    static fromPointer(ref: boolean | null | undefined): ZeroBool {
        if (ref === null || ref === undefined) {
            return new ZeroBool();
        }
        return ZeroBool.from(ref);
    }
}
