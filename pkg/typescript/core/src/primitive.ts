// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import type {Kind} from "./type";
import type {DriverValue, JSONLiteral} from "./interfaces";
import {OverflowError, ParseError, TypeMismatchError} from "./errors";

/**
 * Everything a wrapper needs to know about its underlying primitive.
 *
 * Decoding functions throw one of the errors in `./errors`; they never see
 * absent input, which the wrapper handles according to its family.
 */
export interface Primitive<T> {
    readonly kind: Kind;

    /** Quoted `"null"` in JSON is read as absent. */
    readonly legacyQuotedNull: boolean;

    zero(): T;

    isZero(value: T): boolean;

    equals(a: T, b: T): boolean;

    copy(value: T): T;

    /** Validate (and, for narrow floats, round) a value handed in by a caller. */
    check(value: T): T;

    parseText(text: string): T;

    formatText(value: T): string;

    /** `parsed` is the result of `JSON.parse(raw)`, never `null`. */
    fromJSON(parsed: unknown, raw: string): T;

    toJSON(value: T): JSONLiteral;

    marshalJSON(value: T): string;

    /** `src` is never `null` or `undefined`. */
    fromDriver(src: unknown): T;

    toDriver(value: T): DriverValue;
}

export type JSONKind = "null" | "boolean" | "number" | "string" | "array" | "object";

export function jsonKind(parsed: unknown): JSONKind {
    if (parsed === null) {
        return "null";
    }
    if (Array.isArray(parsed)) {
        return "array";
    }
    switch (typeof parsed) {
        case "boolean":
            return "boolean";
        case "number":
            return "number";
        case "string":
            return "string";
        default:
            return "object";
    }
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const INTEGER_LITERAL = /^-?\d+$/;

export interface IntegerRange {
    readonly min: bigint;
    readonly max: bigint;
}

export function checkRange(kind: Kind, value: bigint, input: string, range: IntegerRange): bigint {
    if (value < range.min || value > range.max) {
        throw new OverflowError(kind, input, range.min, range.max);
    }
    return value;
}

/**
 * Parse a decimal integer with an optional sign.
 */
export function parseInteger(kind: Kind, text: string, range: IntegerRange): bigint {
    if (!INTEGER_TEXT.test(text)) {
        throw new ParseError(kind, text);
    }
    return checkRange(kind, BigInt(text), text, range);
}

/**
 * Read an integer from a JSON number literal or a quoted decimal string.
 * The literal is taken from `raw` so that 64-bit values keep their precision.
 */
export function integerFromJSON(kind: Kind, parsed: unknown, raw: string, range: IntegerRange): bigint {
    if (typeof parsed === "number") {
        if (!INTEGER_LITERAL.test(raw)) {
            throw new TypeMismatchError(kind, `number ${raw}`);
        }
        return checkRange(kind, BigInt(raw), raw, range);
    }
    if (typeof parsed === "string") {
        return parseInteger(kind, parsed, range);
    }
    throw new TypeMismatchError(kind, jsonKind(parsed));
}
