// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

/**
 * A JSON value as `JSON.stringify` receives it from `toJSON()`.
 */
export type JSONLiteral = null | boolean | number | string;

/**
 * A value a database driver accepts as a statement parameter or returns in a result column.
 */
export type DriverValue = null | boolean | number | bigint | string | Uint8Array | Date;

export interface JSONMarshaler {
    /** Exact JSON text of the value. */
    marshalJSON(): string;

    /** Called by `JSON.stringify`. */
    toJSON(): JSONLiteral;
}

export interface JSONUnmarshaler {
    unmarshalJSON(data: string): void;
}

export interface TextMarshaler {
    marshalText(): string;
}

export interface TextUnmarshaler {
    unmarshalText(text: string): void;
}

/**
 * Relational encode: the value to bind as a statement parameter.
 */
export interface Valuer {
    driverValue(): DriverValue;
}

/**
 * Relational decode: copies a driver's result column in.
 */
export interface Scanner {
    scan(src: unknown): void;
}

export function isJSONMarshaler(value: unknown): value is JSONMarshaler {
    return typeof value === "object" && value !== null
        && "marshalJSON" in value && typeof value.marshalJSON === "function";
}

export function isValuer(value: unknown): value is Valuer {
    return typeof value === "object" && value !== null
        && "driverValue" in value && typeof value.driverValue === "function";
}
