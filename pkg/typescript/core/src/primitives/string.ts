// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {BindingTypeError, TypeMismatchError, describeType} from "../errors";
import {jsonKind} from "../primitive";
import type {Primitive} from "../primitive";

const decoder = new TextDecoder("utf-8", {fatal: true});

export const string: Primitive<string> = {
    kind: "String",
    legacyQuotedNull: false,
    zero: () => "",
    isZero: value => value === "",
    equals: (a, b) => a === b,
    copy: value => value,
    check(value) {
        if (typeof value !== "string") {
            throw new TypeMismatchError("String", describeType(value));
        }
        return value;
    },
    parseText: text => text,
    formatText: value => value,
    fromJSON(parsed) {
        if (typeof parsed !== "string") {
            throw new TypeMismatchError("String", jsonKind(parsed));
        }
        return parsed;
    },
    toJSON: value => value,
    marshalJSON: value => JSON.stringify(value),
    fromDriver(src) {
        if (typeof src === "string") {
            return src;
        }
        if (src instanceof Uint8Array) {
            try {
                return decoder.decode(src);
            } catch (e) {
                if (e instanceof TypeError) {
                    throw new BindingTypeError("String", "invalid UTF-8 bytes");
                }
                throw e;
            }
        }
        throw new BindingTypeError("String", describeType(src));
    },
    toDriver: value => value,
};
