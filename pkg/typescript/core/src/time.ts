// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {ParseError} from "./errors";

/**
 * A fixed-offset location.
 */
export interface Zone {
    readonly name: string;
    readonly offsetMinutes: number;
}

export const UTC: Zone = Object.freeze({name: "UTC", offsetMinutes: 0});

const MAX_OFFSET_MINUTES = 24 * 60 - 1;

/**
 * Create a zone that always has the given name and offset east of UTC.
 */
export function fixedZone(name: string, offsetMinutes: number): Zone {
    if (!Number.isInteger(offsetMinutes) || Math.abs(offsetMinutes) > MAX_OFFSET_MINUTES) {
        throw new RangeError(`Invalid zone offset: ${offsetMinutes}`);
    }
    return Object.freeze({name, offsetMinutes});
}

const MILLIS_PER_MINUTE = 60_000;

/**
 * An instant with millisecond precision, together with the location it is viewed in.
 *
 * Two values can denote the same instant while differing in location:
 * 14:00+02:00 and 12:00Z are {@link equal} but not {@link exactEqual}.
 * The zero value is the Unix epoch.
 */
export class ZonedTime {
    static readonly MAX_EPOCH_MILLIS = 8_640_000_000_000_000;
    static readonly MIN_EPOCH_MILLIS = -8_640_000_000_000_000;

    private constructor(
        public readonly epochMillis: number,
        public readonly zone: Zone
    ) {
    }

    static fromEpochMillis(millis: number, zone: Zone = UTC): ZonedTime {
        if (!Number.isInteger(millis) || millis < ZonedTime.MIN_EPOCH_MILLIS || millis > ZonedTime.MAX_EPOCH_MILLIS) {
            throw new RangeError(`Invalid epoch milliseconds: ${millis}`);
        }
        // normalize -0
        return new ZonedTime(millis === 0 ? 0 : millis, zone);
    }

    static fromDate(date: Date, zone: Zone = UTC): ZonedTime {
        const millis = date.getTime();
        if (Number.isNaN(millis)) {
            throw new RangeError("Invalid Date");
        }
        return ZonedTime.fromEpochMillis(millis, zone);
    }

    static zero(): ZonedTime {
        return new ZonedTime(0, UTC);
    }

    static now(zone: Zone = UTC): ZonedTime {
        return ZonedTime.fromEpochMillis(Date.now(), zone);
    }

    /**
     * Parse an RFC 3339 timestamp such as `2012-12-21T23:21:21.000+02:00`.
     * The result is located in a fixed zone named after the offset, or in {@link UTC} for `Z`.
     */
    static parse(str: string): ZonedTime {
        const match = str.match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/);
        if (!match) {
            throw new ParseError("ZonedTime", str);
        }

        const year = parseInt(match[1], 10);
        const month = parseInt(match[2], 10);
        const day = parseInt(match[3], 10);
        const hour = parseInt(match[4], 10);
        const minute = parseInt(match[5], 10);
        const second = parseInt(match[6], 10);
        const millis = match[7] ? parseInt(match[7].padEnd(3, "0").substring(0, 3), 10) : 0;

        if (hour > 23 || minute > 59 || second > 59 || !isValidDate(year, month, day)) {
            throw new ParseError("ZonedTime", str);
        }

        const zone = match[8] === "Z" ? UTC : parseOffset(match[8], str);
        const wallClock = utcMillis(year, month, day, hour, minute, second, millis);
        return ZonedTime.fromEpochMillis(wallClock - zone.offsetMinutes * MILLIS_PER_MINUTE, zone);
    }

    /**
     * The same instant, viewed in another zone.
     */
    in(zone: Zone): ZonedTime {
        return new ZonedTime(this.epochMillis, zone);
    }

    isZero(): boolean {
        return this.epochMillis === 0;
    }

    /**
     * True if both denote the same instant, whatever their zones.
     */
    equal(other: ZonedTime): boolean {
        return this.epochMillis === other.epochMillis;
    }

    /**
     * True if both denote the same instant in the same zone.
     */
    exactEqual(other: ZonedTime): boolean {
        return this.epochMillis === other.epochMillis
            && this.zone.name === other.zone.name
            && this.zone.offsetMinutes === other.zone.offsetMinutes;
    }

    toDate(): Date {
        return new Date(this.epochMillis);
    }

    /**
     * Format as RFC 3339 with millisecond precision, in this value's zone.
     */
    toISOString(): string {
        const wallClock = new Date(this.epochMillis + this.zone.offsetMinutes * MILLIS_PER_MINUTE).toISOString();
        return wallClock.substring(0, wallClock.length - 1) + formatOffset(this.zone.offsetMinutes);
    }

    toString(): string {
        return this.toISOString();
    }

    valueOf(): number {
        return this.epochMillis;
    }
}

function parseOffset(offset: string, input: string): Zone {
    const sign = offset[0] === "-" ? -1 : 1;
    const hours = parseInt(offset.substring(1, 3), 10);
    const minutes = parseInt(offset.substring(4, 6), 10);
    if (hours > 23 || minutes > 59) {
        throw new ParseError("ZonedTime", input);
    }
    return fixedZone(offset, sign * (hours * 60 + minutes));
}

function formatOffset(offsetMinutes: number): string {
    if (offsetMinutes === 0) {
        return "Z";
    }
    const sign = offsetMinutes < 0 ? "-" : "+";
    const abs = Math.abs(offsetMinutes);
    const hours = String(Math.floor(abs / 60)).padStart(2, "0");
    const minutes = String(abs % 60).padStart(2, "0");
    return `${sign}${hours}:${minutes}`;
}

function utcMillis(year: number, month: number, day: number, hour: number, minute: number, second: number, millis: number): number {
    // Date.UTC maps years 0-99 to 1900-1999
    const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millis));
    date.setUTCFullYear(year);
    return date.getTime();
}

function isValidDate(year: number, month: number, day: number): boolean {
    if (month < 1 || month > 12 || day < 1) {
        return false;
    }
    const date = new Date(Date.UTC(2000, month - 1, day));
    date.setUTCFullYear(year);

    return date.getUTCFullYear() === year &&
        date.getUTCMonth() === month - 1 &&
        date.getUTCDate() === day;
}
