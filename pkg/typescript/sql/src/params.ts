/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

import {isValuer} from "@nullwrap/core";
import type {DriverValue, Valuer} from "@nullwrap/core";

/**
 * A statement parameter: a wrapper, or a value the driver already understands.
 */
export type Param = Valuer | DriverValue | undefined;

export function bindValue(param: Param): DriverValue {
    if (param === undefined) {
        return null;
    }
    if (isValuer(param)) {
        return param.driverValue();
    }
    return param;
}

/**
 * Turn positional or named parameters into driver values.
 */
export function bindParams(params: Param[]): DriverValue[];
export function bindParams(params: Record<string, Param>): Record<string, DriverValue>;
export function bindParams(params: Param[] | Record<string, Param>): DriverValue[] | Record<string, DriverValue> {
    if (Array.isArray(params)) {
        return params.map(param => bindValue(param));
    }

    const bound: Record<string, DriverValue> = {};
    for (const [name, param] of Object.entries(params)) {
        bound[name] = bindValue(param);
    }
    return bound;
}
