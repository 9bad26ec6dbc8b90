// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {BindingTypeError, ParseError, TypeMismatchError, describeType} from "../errors";
import {jsonKind} from "../primitive";
import type {Primitive} from "../primitive";

export const bool: Primitive<boolean> = {
    kind: "Bool",
    legacyQuotedNull: false,
    zero: () => false,
    isZero: value => !value,
    equals: (a, b) => a === b,
    copy: value => value,
    check(value) {
        if (typeof value !== "boolean") {
            throw new TypeMismatchError("Bool", describeType(value));
        }
        return value;
    },
    parseText(text) {
        if (text === "true") {
            return true;
        }
        if (text === "false") {
            return false;
        }
        throw new ParseError("Bool", text);
    },
    formatText: value => String(value),
    fromJSON(parsed) {
        if (typeof parsed !== "boolean") {
            throw new TypeMismatchError("Bool", jsonKind(parsed));
        }
        return parsed;
    },
    toJSON: value => value,
    marshalJSON: value => String(value),
    fromDriver(src) {
        if (typeof src === "boolean") {
            return src;
        }
        // TINYINT(1) and SQLite integers
        if (src === 0 || src === 1 || src === BigInt(0) || src === BigInt(1)) {
            return src === 1 || src === BigInt(1);
        }
        throw new BindingTypeError("Bool", describeType(src));
    },
    toDriver: value => value,
};
