// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ZeroValue} from "../nullable";
import {timestamp} from "../primitives/timestamp";
import {ZonedTime} from "../time";

/**
 * A timestamp that marshals to `0` (the epoch) when null.
 * Considered null by a driver if it is the epoch.
 */
export class ZeroTimestamp extends ZeroValue<ZonedTime> {
    readonly kind = "Timestamp" as const;

    constructor(value: ZonedTime = ZonedTime.zero(), valid: boolean = false) {
        super(timestamp, value, valid);
    }

    /**
     * Invalid if `value` is the epoch.
     */
    static from(value: ZonedTime): ZeroTimestamp {
        return new ZeroTimestamp(value, !value.isZero());
    }

    static fromDate(date: Date): ZeroTimestamp {
        return ZeroTimestamp.from(ZonedTime.fromDate(date));
    }

    static fromPointer(ref: ZonedTime | null | undefined): ZeroTimestamp {
        if (ref === null || ref === undefined) {
            return new ZeroTimestamp();
        }
        return ZeroTimestamp.from(ref);
    }

    exactEqual(other: ZeroTimestamp): boolean {
        return this.valueOrZero().exactEqual(other.valueOrZero());
    }
}
