/**
 * MIT License
 * Copyright (c) 2025 ReifyDB
 * See license.md file for full license text
 */

export class NullwrapError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "NullwrapError";

        // Required for instanceof checks to work properly
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The input is not well-formed JSON. The native `SyntaxError` is kept as `cause`.
 */
export class JSONSyntaxError extends NullwrapError {
    public readonly input: string;

    constructor(input: string, cause: SyntaxError) {
        super(`Invalid JSON ${JSON.stringify(input)}: ${cause.message}`, {cause});
        this.name = "JSONSyntaxError";
        this.input = input;
    }
}

/**
 * Well-formed input of the wrong kind, e.g. a boolean where a number is expected.
 */
export class TypeMismatchError extends NullwrapError {
    public readonly expected: string;
    public readonly actual: string;

    constructor(expected: string, actual: string) {
        super(`Cannot unmarshal ${actual} into ${expected}`);
        this.name = "TypeMismatchError";
        this.expected = expected;
        this.actual = actual;
    }
}

export class OverflowError extends NullwrapError {
    public readonly kind: string;
    public readonly input: string;

    constructor(kind: string, input: string, min: bigint | number, max: bigint | number) {
        super(`${kind} value must be between ${min} and ${max}, got ${input}`);
        this.name = "OverflowError";
        this.kind = kind;
        this.input = input;
    }
}

export class ParseError extends NullwrapError {
    public readonly kind: string;
    public readonly input: string;

    constructor(kind: string, input: string) {
        super(`Cannot parse ${JSON.stringify(input)} as ${kind}`);
        this.name = "ParseError";
        this.kind = kind;
        this.input = input;
    }
}

/**
 * A driver handed over a source value of a type the wrapper does not accept.
 */
export class BindingTypeError extends NullwrapError {
    public readonly kind: string;
    public readonly sourceType: string;

    constructor(kind: string, sourceType: string) {
        super(`Cannot scan ${sourceType} into ${kind}`);
        this.name = "BindingTypeError";
        this.kind = kind;
        this.sourceType = sourceType;
    }
}

export class UnsupportedValueError extends NullwrapError {
    public readonly kind: string;

    constructor(kind: string, value: string) {
        super(`${kind} value ${value} has no JSON representation`);
        this.name = "UnsupportedValueError";
        this.kind = kind;
    }
}

/**
 * Name of a value's type as it shows up in error messages.
 */
export function describeType(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (Array.isArray(value)) {
        return "array";
    }
    if (value instanceof Date) {
        return "Date";
    }
    if (value instanceof Uint8Array) {
        return "Uint8Array";
    }
    return typeof value;
}
