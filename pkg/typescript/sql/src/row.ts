// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {create} from "@nullwrap/core";
import type {Family, Kind, Scanner, WrapperOf} from "@nullwrap/core";
import {scanRow} from "./scan";
import type {Row, ScanOptions} from "./scan";

export type RowSchema = Readonly<Record<string, Kind>>;

export type InferRow<F extends Family, S extends RowSchema> = {
    [C in keyof S]: WrapperOf<F, S[C]>;
};

export interface RowReader<F extends Family, S extends RowSchema> {
    readonly family: F;
    readonly schema: S;

    read(row: Row, options?: ScanOptions): InferRow<F, S>;
}

/**
 * Describe the columns of a result row once and read typed wrappers out of each row.
 *
 * @example
 * const users = defineRow("null", {id: "Int64", name: "String", deleted_at: "Timestamp"});
 * const user = users.read(row);
 * user.deleted_at.valid; // NullTimestamp
 */
export function defineRow<F extends Family, const S extends RowSchema>(family: F, schema: S): RowReader<F, S> {
    return {
        family,
        schema,
        read(row, options) {
            const wrappers: Record<string, Scanner> = {};
            for (const [column, kind] of Object.entries(schema)) {
                wrappers[column] = create(family, kind);
            }
            scanRow(row, wrappers, options);
            return wrappers as InferRow<F, S>;
        },
    };
}
