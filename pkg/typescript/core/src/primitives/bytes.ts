// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {BindingTypeError, ParseError, TypeMismatchError, describeType} from "../errors";
import {jsonKind} from "../primitive";
import type {Primitive} from "../primitive";

const HEX = /^(?:0[xX])?((?:[0-9a-fA-F]{2})*)$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const encoder = new TextEncoder();

function toBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

function toHex(bytes: Uint8Array): string {
    return "0x" + Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

/**
 * Byte sequences. Text form is `0x`-prefixed hex, JSON form is a base64 string.
 * Values are copied on the way in and out, so a wrapper never shares a buffer with its caller.
 */
export const bytes: Primitive<Uint8Array> = {
    kind: "Bytes",
    legacyQuotedNull: false,
    zero: () => new Uint8Array(0),
    isZero: value => value.length === 0,
    equals(a, b) {
        if (a.length !== b.length) {
            return false;
        }
        for (let i = 0; i < a.length; i++) {
            if (a[i] !== b[i]) {
                return false;
            }
        }
        return true;
    },
    copy: value => new Uint8Array(value),
    check(value) {
        if (!(value instanceof Uint8Array)) {
            throw new TypeMismatchError("Bytes", describeType(value));
        }
        return new Uint8Array(value);
    },
    parseText(text) {
        const match = text.match(HEX);
        if (!match) {
            throw new ParseError("Bytes", text);
        }
        return new Uint8Array(Buffer.from(match[1], "hex"));
    },
    formatText: value => toHex(value),
    fromJSON(parsed) {
        if (typeof parsed !== "string") {
            throw new TypeMismatchError("Bytes", jsonKind(parsed));
        }
        if (!BASE64.test(parsed)) {
            throw new ParseError("Bytes", parsed);
        }
        return new Uint8Array(Buffer.from(parsed, "base64"));
    },
    toJSON: value => toBase64(value),
    marshalJSON: value => JSON.stringify(toBase64(value)),
    fromDriver(src) {
        if (src instanceof Uint8Array) {
            return new Uint8Array(src);
        }
        if (typeof src === "string") {
            return encoder.encode(src);
        }
        throw new BindingTypeError("Bytes", describeType(src));
    },
    toDriver: value => new Uint8Array(value),
};
