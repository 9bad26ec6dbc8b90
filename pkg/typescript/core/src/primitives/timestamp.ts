// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {BindingTypeError, TypeMismatchError, describeType} from "../errors";
import {integerFromJSON, parseInteger} from "../primitive";
import type {IntegerRange, Primitive} from "../primitive";
import {ZonedTime} from "../time";

const EPOCH_MILLIS: IntegerRange = {
    min: BigInt(ZonedTime.MIN_EPOCH_MILLIS),
    max: BigInt(ZonedTime.MAX_EPOCH_MILLIS),
};

function fromMillis(millis: bigint): ZonedTime {
    return ZonedTime.fromEpochMillis(Number(millis));
}

/**
 * Timestamps travel through JSON and text as integer milliseconds since the epoch,
 * and through drivers as `Date`. Decoded values are in UTC.
 */
export const timestamp: Primitive<ZonedTime> = {
    kind: "Timestamp",
    legacyQuotedNull: true,
    zero: () => ZonedTime.zero(),
    isZero: value => value.isZero(),
    equals: (a, b) => a.equal(b),
    // immutable
    copy: value => value,
    check(value) {
        if (!(value instanceof ZonedTime)) {
            throw new TypeMismatchError("Timestamp", describeType(value));
        }
        return value;
    },
    parseText: text => fromMillis(parseInteger("Timestamp", text, EPOCH_MILLIS)),
    formatText: value => String(value.epochMillis),
    fromJSON: (parsed, raw) => fromMillis(integerFromJSON("Timestamp", parsed, raw, EPOCH_MILLIS)),
    toJSON: value => value.epochMillis,
    marshalJSON: value => String(value.epochMillis),
    fromDriver(src) {
        if (src instanceof ZonedTime) {
            return src;
        }
        if (src instanceof Date) {
            if (Number.isNaN(src.getTime())) {
                throw new BindingTypeError("Timestamp", "Invalid Date");
            }
            return ZonedTime.fromDate(src);
        }
        throw new BindingTypeError("Timestamp", describeType(src));
    },
    toDriver: value => value.toDate(),
};
