// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
export {bindParams, bindValue} from './params';
export type {Param} from './params';
export {scanRow} from './scan';
export type {Row, ScanOptions} from './scan';
export {defineRow} from './row';
export type {InferRow, RowReader, RowSchema} from './row';
export {ScanError} from './errors';
export {NOOP_LOGGER} from './logger';
export type {Logger} from './logger';
