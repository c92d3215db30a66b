/**
 * Kestrel runtime values.
 */

import { ValueTypeError } from "../errors/errors.js";

/**
 * Value type tags. Every runtime value carries exactly one.
 */
export const enum ValueType {
  Number = "number",
  String = "string",
  Bool = "bool",
  Null = "null",
}

/**
 * Shape shared by every runtime value.
 */
export interface KestrelValue {
  /** Variant tag. */
  readonly type: ValueType;
  /** Debug rendering; strings are quoted. */
  inspect(): string;
  /** Rendering used by `print` and string concatenation. */
  display(): string;
  /** Structural equality. Different variants are never equal. */
  equals(other: RuntimeValue): boolean;
}

/**
 * Null, the result of statements and of functions with nothing to return.
 */
export class NullValue implements KestrelValue {
  readonly type = ValueType.Null;

  inspect(): string {
    return "null";
  }

  display(): string {
    return "null";
  }

  equals(other: RuntimeValue): boolean {
    return other.type === ValueType.Null;
  }
}

/** The singleton null value. */
export const NULL = Object.freeze(new NullValue());

/**
 * Boolean value.
 */
export class BoolValue implements KestrelValue {
  readonly type = ValueType.Bool;

  constructor(public readonly value: boolean) {}

  inspect(): string {
    return this.value ? "true" : "false";
  }

  display(): string {
    return this.inspect();
  }

  equals(other: RuntimeValue): boolean {
    return other.type === ValueType.Bool && other.value === this.value;
  }
}

/** Singleton true value. */
export const TRUE = Object.freeze(new BoolValue(true));
/** Singleton false value. */
export const FALSE = Object.freeze(new BoolValue(false));

/** Get boolean singleton. */
export function toBool(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

/** Render a number the way `print` shows it, keeping the sign of zero. */
export function formatNumber(n: number): string {
  return Object.is(n, -0) ? "-0" : String(n);
}

/**
 * Number value. All numbers are IEEE-754 doubles.
 */
export class NumberValue implements KestrelValue {
  readonly type = ValueType.Number;

  constructor(public readonly value: number) {}

  inspect(): string {
    return formatNumber(this.value);
  }

  display(): string {
    return formatNumber(this.value);
  }

  equals(other: RuntimeValue): boolean {
    return other.type === ValueType.Number && other.value === this.value;
  }
}

/**
 * String value.
 */
export class StringValue implements KestrelValue {
  readonly type = ValueType.String;

  constructor(public readonly value: string) {}

  inspect(): string {
    return JSON.stringify(this.value);
  }

  display(): string {
    return this.value;
  }

  equals(other: RuntimeValue): boolean {
    return other.type === ValueType.String && other.value === this.value;
  }
}

/**
 * Every value a script can produce.
 */
export type RuntimeValue = NumberValue | StringValue | BoolValue | NullValue;

/**
 * Name of a value's variant as it appears in error messages.
 */
export function typeName(value: RuntimeValue): string {
  switch (value.type) {
    case ValueType.Number:
      return "Number";
    case ValueType.String:
      return "String";
    case ValueType.Bool:
      return "Bool";
    case ValueType.Null:
      return "Null";
  }
}

/**
 * Create a runtime value from a JavaScript value.
 */
export function fromJS(value: unknown): RuntimeValue {
  if (value === null || value === undefined) {
    return NULL;
  }
  if (typeof value === "boolean") {
    return toBool(value);
  }
  if (typeof value === "number") {
    return new NumberValue(value);
  }
  if (typeof value === "string") {
    return new StringValue(value);
  }
  throw new ValueTypeError(`cannot convert ${typeof value} to a Kestrel value`);
}

/**
 * Convert a runtime value to a JavaScript value.
 */
export function toJS(value: RuntimeValue): number | string | boolean | null {
  switch (value.type) {
    case ValueType.Null:
      return null;
    case ValueType.Bool:
    case ValueType.Number:
    case ValueType.String:
      return value.value;
  }
}
