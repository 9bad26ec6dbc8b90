/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

import type {Family, Kind} from "./type";
import {
    NullBool, NullBytes, NullFloat32, NullFloat64, NullInt8, NullInt16, NullInt32, NullInt64,
    NullString, NullTimestamp, NullUint64
} from "./null";
import {
    ZeroBool, ZeroBytes, ZeroFloat32, ZeroFloat64, ZeroInt8, ZeroInt16, ZeroInt32, ZeroInt64,
    ZeroString, ZeroTimestamp, ZeroUint64
} from "./zero";

export interface NullWrappers {
    Int8: NullInt8;
    Int16: NullInt16;
    Int32: NullInt32;
    Int64: NullInt64;
    Uint64: NullUint64;
    Float32: NullFloat32;
    Float64: NullFloat64;
    Bool: NullBool;
    String: NullString;
    Bytes: NullBytes;
    Timestamp: NullTimestamp;
}

export interface ZeroWrappers {
    Int8: ZeroInt8;
    Int16: ZeroInt16;
    Int32: ZeroInt32;
    Int64: ZeroInt64;
    Uint64: ZeroUint64;
    Float32: ZeroFloat32;
    Float64: ZeroFloat64;
    Bool: ZeroBool;
    String: ZeroString;
    Bytes: ZeroBytes;
    Timestamp: ZeroTimestamp;
}

export type WrapperOf<F extends Family, K extends Kind> =
    F extends "null" ? NullWrappers[K] :
        F extends "zero" ? ZeroWrappers[K] :
            never;

type KindFactories<F extends Family> = {
    [K in Kind]: () => WrapperOf<F, K>;
};

type Factories = {
    [F in Family]: KindFactories<F>;
};

const FACTORIES: Factories = {
    null: {
        Int8: () => new NullInt8(),
        Int16: () => new NullInt16(),
        Int32: () => new NullInt32(),
        Int64: () => new NullInt64(),
        Uint64: () => new NullUint64(),
        Float32: () => new NullFloat32(),
        Float64: () => new NullFloat64(),
        Bool: () => new NullBool(),
        String: () => new NullString(),
        Bytes: () => new NullBytes(),
        Timestamp: () => new NullTimestamp(),
    },
    zero: {
        Int8: () => new ZeroInt8(),
        Int16: () => new ZeroInt16(),
        Int32: () => new ZeroInt32(),
        Int64: () => new ZeroInt64(),
        Uint64: () => new ZeroUint64(),
        Float32: () => new ZeroFloat32(),
        Float64: () => new ZeroFloat64(),
        Bool: () => new ZeroBool(),
        String: () => new ZeroString(),
        Bytes: () => new ZeroBytes(),
        Timestamp: () => new ZeroTimestamp(),
    },
};

/**
 * A fresh, invalid wrapper of the given family and kind, ready to decode into.
 */
export function create<F extends Family, K extends Kind>(family: F, kind: K): WrapperOf<F, K> {
    const byKind: KindFactories<F> = FACTORIES[family];
    const factory: () => WrapperOf<F, K> = byKind[kind];
    return factory();
}
