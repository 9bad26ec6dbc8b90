// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export const KINDS = [
    "Int8", "Int16", "Int32", "Int64",
    "Uint64",
    "Float32", "Float64",
    "Bool",
    "String",
    "Bytes",
    "Timestamp",
] as const;

export type Kind = typeof KINDS[number];

/**
 * Null policy of a wrapper.
 *
 * - `null`: absence and the zero value are distinct; absence encodes as `null`.
 * - `zero`: absence and the zero value are the same thing; absence encodes as the zero literal.
 */
export type Family = "null" | "zero";

export function isKind(value: string): value is Kind {
    return KINDS.some(kind => kind === value);
}
