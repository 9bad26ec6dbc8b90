// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export {ZeroInt8} from './int8';
export {ZeroInt16} from './int16';
export {ZeroInt32} from './int32';
export {ZeroInt64} from './int64';
export {ZeroUint64} from './uint64';
export {ZeroFloat32} from './float32';
export {ZeroFloat64} from './float64';
export {ZeroBool} from './bool';
export {ZeroString} from './string';
export {ZeroBytes} from './bytes';
export {ZeroTimestamp} from './timestamp';
