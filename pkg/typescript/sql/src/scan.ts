// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import type {Scanner} from "@nullwrap/core";
import {ScanError} from "./errors";
import {NOOP_LOGGER} from "./logger";
import type {Logger} from "./logger";

export interface ScanOptions {
    /** Fail on a target whose column is missing from the row, instead of skipping it. */
    strict?: boolean;
    logger?: Logger;
}

/**
 * A result row as drivers return it: column name to column value.
 */
export type Row = Readonly<Record<string, unknown>>;

/**
 * Scan the named columns of a row into their targets.
 */
export function scanRow(row: Row, targets: Readonly<Record<string, Scanner>>, options: ScanOptions = {}): void {
    const logger = options.logger ?? NOOP_LOGGER;

    for (const [column, target] of Object.entries(targets)) {
        if (!Object.hasOwn(row, column)) {
            if (options.strict) {
                throw new ScanError(column, "column not present in row");
            }
            logger.debug(`[scanRow] column "${column}" not present in row, skipping`);
            continue;
        }

        try {
            target.scan(row[column]);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ScanError(column, reason, {cause: err});
        }
    }
}
