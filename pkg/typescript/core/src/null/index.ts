// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export {NullInt8} from './int8';
export {NullInt16} from './int16';
export {NullInt32} from './int32';
export {NullInt64} from './int64';
export {NullUint64} from './uint64';
export {NullFloat32} from './float32';
export {NullFloat64} from './float64';
export {NullBool} from './bool';
export {NullString} from './string';
export {NullBytes} from './bytes';
export {NullTimestamp} from './timestamp';
