// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import type {Kind} from "../type";
import {
    BindingTypeError,
    OverflowError,
    ParseError,
    TypeMismatchError,
    UnsupportedValueError,
    describeType
} from "../errors";
import {jsonKind} from "../primitive";
import type {Primitive} from "../primitive";

type FloatKind = Extract<Kind, "Float32" | "Float64">;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY = /^([+-]?)(inf|infinity)$/i;
const NAN = /^nan$/i;

const FLOAT32_MAX = 3.4028234663852886e38;

interface Width {
    readonly max: number;

    /** Round to the width. */
    round(value: number): number;

    /** Shortest decimal that reads back as the same value at this width. */
    format(value: number): string;
}

const FLOAT64: Width = {
    max: Number.MAX_VALUE,
    round: value => value,
    format: value => Object.is(value, -0) ? "-0" : String(value),
};

const FLOAT32: Width = {
    max: FLOAT32_MAX,
    round: value => Math.fround(value),
    format(value) {
        if (Object.is(value, -0)) {
            return "-0";
        }
        if (!Number.isFinite(value) || value === 0) {
            return String(value);
        }
        for (let precision = 1; precision < 10; precision++) {
            const candidate = Number(value.toPrecision(precision));
            if (Math.fround(candidate) === value) {
                return String(candidate);
            }
        }
        return String(value);
    },
};

function float(kind: FloatKind, width: Width): Primitive<number> {
    // a finite input that does not fit the width is an overflow, not an infinity
    const fit = (value: number, input: string): number => {
        const rounded = width.round(value);
        if (Number.isFinite(value) && !Number.isFinite(rounded)) {
            throw new OverflowError(kind, input, -width.max, width.max);
        }
        return rounded;
    };

    const literal = (value: number): number => {
        if (!Number.isFinite(value)) {
            throw new UnsupportedValueError(kind, String(value));
        }
        return value;
    };

    return {
        kind,
        legacyQuotedNull: false,
        zero: () => 0,
        isZero: value => value === 0,
        equals: (a, b) => a === b,
        copy: value => value,
        check(value) {
            if (typeof value !== "number") {
                throw new TypeMismatchError(kind, describeType(value));
            }
            return fit(value, String(value));
        },
        parseText(text) {
            if (DECIMAL.test(text)) {
                const value = Number(text);
                if (!Number.isFinite(value)) {
                    throw new OverflowError(kind, text, -width.max, width.max);
                }
                return fit(value, text);
            }
            const infinity = text.match(INFINITY);
            if (infinity) {
                return infinity[1] === "-" ? -Infinity : Infinity;
            }
            if (NAN.test(text)) {
                return NaN;
            }
            throw new ParseError(kind, text);
        },
        formatText: value => width.format(value),
        fromJSON(parsed, raw) {
            if (typeof parsed !== "number") {
                throw new TypeMismatchError(kind, jsonKind(parsed));
            }
            // JSON.parse reads 1e400 as Infinity
            if (!Number.isFinite(parsed)) {
                throw new OverflowError(kind, raw, -width.max, width.max);
            }
            return fit(parsed, raw);
        },
        toJSON: value => Number(width.format(literal(value))),
        marshalJSON: value => width.format(literal(value)),
        fromDriver(src) {
            if (typeof src !== "number") {
                throw new BindingTypeError(kind, describeType(src));
            }
            return fit(src, String(src));
        },
        toDriver: value => value,
    };
}

export const float32 = float("Float32", FLOAT32);
export const float64 = float("Float64", FLOAT64);
