// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullValue} from "../nullable";
import {timestamp} from "../primitives/timestamp";
import {ZonedTime} from "../time";

/**
 * A nullable timestamp. JSON and text forms are milliseconds since the epoch;
 * it marshals to JSON `null` if invalid.
 */
export class NullTimestamp extends NullValue<ZonedTime> {
    readonly kind = "Timestamp" as const;

    constructor(value: ZonedTime = ZonedTime.zero(), valid: boolean = false) {
        super(timestamp, value, valid);
    }

    static from(value: ZonedTime): NullTimestamp {
        return new NullTimestamp(value, true);
    }

    static fromDate(date: Date): NullTimestamp {
        return NullTimestamp.from(ZonedTime.fromDate(date));
    }

    /**
     * Invalid if `ref` is null or undefined.
     */
    static fromPointer(ref: ZonedTime | null | undefined): NullTimestamp {
        if (ref === null || ref === undefined) {
            return new NullTimestamp();
        }
        return NullTimestamp.from(ref);
    }

    /**
     * True if both are null, or both denote the same instant in the same zone.
     * {@link equal} ignores the zone: 14:00+02:00 and 12:00Z are equal but not exactly equal.
     */
    exactEqual(other: NullTimestamp): boolean {
        return this.valid === other.valid && (!this.valid || this.value.exactEqual(other.value));
    }
}
