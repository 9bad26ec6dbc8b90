// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

/**
 * Where binding helpers report what they skipped. `console` fits.
 */
export interface Logger {
    debug(message: string, ...args: unknown[]): void;
}

export const NOOP_LOGGER: Logger = {
    debug() {
    },
};
