// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {NullwrapError} from "@nullwrap/core";

/**
 * A result column could not be scanned. The underlying error, if any, is the `cause`.
 */
export class ScanError extends NullwrapError {
    public readonly column: string;

    constructor(column: string, reason: string, options?: ErrorOptions) {
        super(`Cannot scan column "${column}": ${reason}`, options);
        this.name = "ScanError";
        this.column = column;
    }
}
