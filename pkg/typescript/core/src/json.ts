// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {isJSONMarshaler} from "./interfaces";
import {UnsupportedValueError, describeType} from "./errors";

function hasToJSON(value: object): value is { toJSON(): unknown } {
    return "toJSON" in value && typeof value.toJSON === "function";
}

/**
 * Like `JSON.stringify`, but writes every {@link JSONMarshaler} through
 * `marshalJSON()`, so 64-bit wrappers keep full precision. Bare bigints are
 * written as number literals as well. A cyclic structure raises
 * {@link UnsupportedValueError}.
 */
export function stringify(value: unknown): string {
    return write(value, new WeakSet<object>());
}

function write(value: unknown, visiting: WeakSet<object>): string {
    if (isJSONMarshaler(value)) {
        return value.marshalJSON();
    }
    if (typeof value === "bigint") {
        return value.toString();
    }
    if (typeof value === "object" && value !== null) {
        if (visiting.has(value)) {
            throw new UnsupportedValueError(describeType(value), "[Circular]");
        }
        visiting.add(value);
        try {
            return writeObject(value, visiting);
        } finally {
            visiting.delete(value);
        }
    }
    if (value === undefined || typeof value === "function" || typeof value === "symbol") {
        throw new UnsupportedValueError(describeType(value), String(value));
    }
    return JSON.stringify(value);
}

function writeObject(value: object, visiting: WeakSet<object>): string {
    if (Array.isArray(value)) {
        const items = value.map(item => item === undefined || typeof item === "function" ? "null" : write(item, visiting));
        return `[${items.join(",")}]`;
    }
    if (hasToJSON(value)) {
        return write(value.toJSON(), visiting);
    }
    const fields: string[] = [];
    for (const [key, item] of Object.entries(value)) {
        if (item === undefined || typeof item === "function") {
            continue;
        }
        fields.push(`${JSON.stringify(key)}:${write(item, visiting)}`);
    }
    return `{${fields.join(",")}}`;
}
