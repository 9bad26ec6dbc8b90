// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {bytes} from "../primitives/bytes";

/**
 * A nullable byte sequence. JSON form is base64, text form is `0x`-prefixed hex.
 */
export class NullBytes extends NullValue<Uint8Array> {
    readonly kind = "Bytes" as const;

    constructor(value: Uint8Array = new Uint8Array(0), valid: boolean = false) {
        super(bytes, value, valid);
    }

    static from(value: Uint8Array): NullBytes {
        return new NullBytes(value, true);
    }

    /**
     * Invalid if `ref` is null or undefined.
     */
    static fromPointer(ref: Uint8Array | null | undefined): NullBytes {
        if (ref === null || ref === undefined) {
            return new NullBytes();
        }
        return NullBytes.from(ref);
    }
}
