// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import type {Family, Kind} from "./type";
import {EMPTY_TEXT, NULL_LITERAL} from "./constant";
import {JSONSyntaxError} from "./errors";
import type {
    DriverValue,
    JSONLiteral,
    JSONMarshaler,
    JSONUnmarshaler,
    Scanner,
    TextMarshaler,
    TextUnmarshaler,
    Valuer
} from "./interfaces";
import type {Primitive} from "./primitive";

/**
 * A primitive value together with a validity flag.
 *
 * Fields are public and mutable: a wrapper is a plain value record. Every decode
 * either fully succeeds or leaves the wrapper invalid and holding the zero value.
 */
export abstract class Nullable<T> implements JSONMarshaler, JSONUnmarshaler, TextMarshaler, TextUnmarshaler, Valuer, Scanner {
    abstract readonly kind: Kind;
    abstract readonly family: Family;

    public value: T;
    public valid: boolean;

    protected constructor(protected readonly primitive: Primitive<T>, value: T, valid: boolean) {
        this.value = primitive.check(value);
        this.valid = valid;
    }

    /**
     * Set a value and mark it valid.
     */
    setValid(value: T): void {
        this.value = this.primitive.check(value);
        this.valid = true;
    }

    valueOrZero(): T {
        return this.valid ? this.value : this.primitive.zero();
    }

    /**
     * A copy of the value, or `undefined` if invalid.
     */
    pointer(): T | undefined {
        return this.valid ? this.primitive.copy(this.value) : undefined;
    }

    abstract isZero(): boolean;

    abstract equal(other: this): boolean;

    abstract marshalJSON(): string;

    abstract toJSON(): JSONLiteral;

    abstract marshalText(): string;

    abstract driverValue(): DriverValue;

    unmarshalJSON(data: string): void {
        let parsed: unknown;
        try {
            parsed = JSON.parse(data);
        } catch (e) {
            this.reset();
            if (e instanceof SyntaxError) {
                throw new JSONSyntaxError(data, e);
            }
            throw e;
        }

        this.decode(() => {
            if (this.isAbsentJSON(parsed)) {
                this.reset();
            } else {
                this.accept(this.primitive.fromJSON(parsed, data.trim()));
            }
        });
    }

    /**
     * Empty text and the literal `null` are both read as absent. The latter is
     * accepted for input written by older encoders.
     */
    unmarshalText(text: string): void {
        this.decode(() => {
            if (text === EMPTY_TEXT || text === NULL_LITERAL) {
                this.reset();
            } else {
                this.accept(this.primitive.parseText(text));
            }
        });
    }

    scan(src: unknown): void {
        this.decode(() => {
            if (src === null || src === undefined) {
                this.reset();
            } else {
                this.accept(this.primitive.fromDriver(src));
            }
        });
    }

    toString(): string {
        return this.valid ? this.primitive.formatText(this.value) : NULL_LITERAL;
    }

    /**
     * Store a successfully decoded, present value.
     */
    protected abstract accept(value: T): void;

    protected isAbsentJSON(parsed: unknown): boolean {
        return parsed === null || (this.primitive.legacyQuotedNull && parsed === NULL_LITERAL);
    }

    protected reset(): void {
        this.value = this.primitive.zero();
        this.valid = false;
    }

    private decode(run: () => void): void {
        try {
            run();
        } catch (e) {
            this.reset();
            throw e;
        }
    }
}

/**
 * Null policy: absence is a state of its own. Invalid wrappers encode as JSON
 * `null`, empty text and a driver `null`; a valid zero value is still present.
 */
export abstract class NullValue<T> extends Nullable<T> {
    readonly family = "null" as const;

    isZero(): boolean {
        return !this.valid;
    }

    equal(other: this): boolean {
        return this.valid === other.valid && (!this.valid || this.primitive.equals(this.value, other.value));
    }

    marshalJSON(): string {
        return this.valid ? this.primitive.marshalJSON(this.value) : NULL_LITERAL;
    }

    toJSON(): JSONLiteral {
        return this.valid ? this.primitive.toJSON(this.value) : null;
    }

    marshalText(): string {
        return this.valid ? this.primitive.formatText(this.value) : EMPTY_TEXT;
    }

    driverValue(): DriverValue {
        return this.valid ? this.primitive.toDriver(this.value) : null;
    }

    protected accept(value: T): void {
        this.value = value;
        this.valid = true;
    }
}

/**
 * Zero policy: absence and the zero value are the same. Absent wrappers encode
 * as the zero literal in JSON and text and as `null` to a driver; decoding the
 * zero value yields an invalid wrapper.
 */
export abstract class ZeroValue<T> extends Nullable<T> {
    readonly family = "zero" as const;

    isZero(): boolean {
        return !this.valid || this.primitive.isZero(this.value);
    }

    /**
     * Compares {@link valueOrZero} of both sides, so null and zero are equal.
     */
    equal(other: this): boolean {
        return this.primitive.equals(this.valueOrZero(), other.valueOrZero());
    }

    marshalJSON(): string {
        return this.primitive.marshalJSON(this.present());
    }

    toJSON(): JSONLiteral {
        return this.primitive.toJSON(this.present());
    }

    marshalText(): string {
        return this.primitive.formatText(this.present());
    }

    driverValue(): DriverValue {
        return this.isZero() ? null : this.primitive.toDriver(this.value);
    }

    protected accept(value: T): void {
        if (this.primitive.isZero(value)) {
            this.reset();
        } else {
            this.value = value;
            this.valid = true;
        }
    }

    protected isAbsentJSON(parsed: unknown): boolean {
        return parsed === EMPTY_TEXT || super.isAbsentJSON(parsed);
    }

    private present(): T {
        return this.isZero() ? this.primitive.zero() : this.value;
    }
}
