// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import type {Kind} from "../type";
import {BindingTypeError, TypeMismatchError, describeType} from "../errors";
import {checkRange, integerFromJSON, parseInteger} from "../primitive";
import type {IntegerRange, Primitive} from "../primitive";

type SmallIntegerKind = Extract<Kind, "Int8" | "Int16" | "Int32">;
type LargeIntegerKind = Extract<Kind, "Int64" | "Uint64">;

function signedRange(bits: number): IntegerRange {
    const half = BigInt(2) ** BigInt(bits - 1);
    return {min: -half, max: half - BigInt(1)};
}

/**
 * Integers that fit a JavaScript number exactly, held as `number`.
 */
function smallInteger(kind: SmallIntegerKind, bits: number): Primitive<number> {
    const range = signedRange(bits);

    return {
        kind,
        legacyQuotedNull: true,
        zero: () => 0,
        isZero: value => value === 0,
        equals: (a, b) => a === b,
        copy: value => value,
        check(value) {
            if (!Number.isInteger(value)) {
                throw new TypeMismatchError(kind, `number ${value}`);
            }
            return Number(checkRange(kind, BigInt(value), String(value), range));
        },
        parseText: text => Number(parseInteger(kind, text, range)),
        formatText: value => String(value),
        fromJSON: (parsed, raw) => Number(integerFromJSON(kind, parsed, raw, range)),
        toJSON: value => value,
        marshalJSON: value => String(value),
        fromDriver(src) {
            if (typeof src === "number" && Number.isInteger(src)) {
                return Number(checkRange(kind, BigInt(src), String(src), range));
            }
            if (typeof src === "bigint") {
                return Number(checkRange(kind, src, src.toString(), range));
            }
            throw new BindingTypeError(kind, describeType(src));
        },
        toDriver: value => value,
    };
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * 64-bit integers, held as `bigint`.
 */
function largeInteger(kind: LargeIntegerKind, range: IntegerRange): Primitive<bigint> {
    return {
        kind,
        legacyQuotedNull: true,
        zero: () => BigInt(0),
        isZero: value => value === BigInt(0),
        equals: (a, b) => a === b,
        copy: value => value,
        check(value) {
            if (typeof value !== "bigint") {
                throw new TypeMismatchError(kind, describeType(value));
            }
            return checkRange(kind, value, value.toString(), range);
        },
        parseText: text => parseInteger(kind, text, range),
        formatText: value => value.toString(),
        fromJSON: (parsed, raw) => integerFromJSON(kind, parsed, raw, range),
        // JSON.stringify cannot write a bigint; unsafe values go out as decimal strings
        toJSON: value => value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString(),
        marshalJSON: value => value.toString(),
        fromDriver(src) {
            if (typeof src === "bigint") {
                return checkRange(kind, src, src.toString(), range);
            }
            if (typeof src === "number" && Number.isInteger(src)) {
                return checkRange(kind, BigInt(src), String(src), range);
            }
            // drivers such as pg hand 64-bit columns over as text
            if (typeof src === "string" && /^-?\d+$/.test(src)) {
                return checkRange(kind, BigInt(src), src, range);
            }
            throw new BindingTypeError(kind, describeType(src));
        },
        toDriver: value => value,
    };
}

export const int8 = smallInteger("Int8", 8);
export const int16 = smallInteger("Int16", 16);
export const int32 = smallInteger("Int32", 32);
export const int64 = largeInteger("Int64", signedRange(64));
export const uint64 = largeInteger("Uint64", {min: BigInt(0), max: BigInt("18446744073709551615")});
