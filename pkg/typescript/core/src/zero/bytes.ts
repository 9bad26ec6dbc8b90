// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {bytes} from "../primitives/bytes";

/**
 * A byte sequence where an empty sequence and null are the same value.
 */
export class ZeroBytes extends ZeroValue<Uint8Array> {
    readonly kind = "Bytes" as const;

    constructor(value: Uint8Array = new Uint8Array(0), valid: boolean = false) {
        super(bytes, value, valid);
    }

    /**
     * Invalid if `value` is the zero value.
     */
    static from(value: Uint8Array): ZeroBytes {
        return new ZeroBytes(value, !bytes.isZero(value));
    }

    /**
     * Invalid if `ref` is null, undefined or the zero value.
     */
    static fromPointer(ref: Uint8Array | null | undefined): ZeroBytes {
        if (ref === null || ref === undefined) {
            return new ZeroBytes();
        }
        return ZeroBytes.from(ref);
    }
}
