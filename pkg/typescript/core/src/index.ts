// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
export {EMPTY_TEXT, NULL_LITERAL} from './constant';
export {KINDS, isKind} from './type';
export type {Family, Kind} from './type';
export {
    NullwrapError,
    JSONSyntaxError,
    TypeMismatchError,
    OverflowError,
    ParseError,
    BindingTypeError,
    UnsupportedValueError,
    describeType
} from './errors';
export {isJSONMarshaler, isValuer} from './interfaces';
export type {
    DriverValue,
    JSONLiteral,
    JSONMarshaler,
    JSONUnmarshaler,
    Scanner,
    TextMarshaler,
    TextUnmarshaler,
    Valuer
} from './interfaces';
export {ZonedTime, UTC, fixedZone} from './time';
export type {Zone} from './time';
export {Nullable, NullValue, ZeroValue} from './nullable';
export type {Primitive} from './primitive';
export * from './null';
export * from './zero';
export {create} from './create';
export type {NullWrappers, ZeroWrappers, WrapperOf} from './create';
export {stringify} from './json';
