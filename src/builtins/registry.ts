/**
 * Native function table: typed, arity-checked host functions callable
 * from scripts by name.
 */

import { ArityError, NameError, ValueTypeError } from "../errors/errors.js";
import { ValueType, typeName, type RuntimeValue } from "../object/object.js";

/**
 * Declared kind of a parameter. `Any` accepts every value.
 */
export const enum ParamKind {
  Number = "Number",
  String = "String",
  Bool = "Bool",
  Null = "Null",
  Any = "Any",
}

/**
 * How many arguments a function takes.
 */
export type Arity = { kind: "exact"; count: number } | { kind: "variadic"; min: number };

/**
 * A function the host exposes to scripts.
 */
export interface NativeFunction {
  /** Name scripts call it by. Unique within a registry. */
  readonly name: string;
  readonly arity: Arity;
  /**
   * Kind of each parameter. Variadic functions check every argument
   * past the end of this list against its last entry.
   */
  readonly params: readonly ParamKind[];
  call(args: Arguments): RuntimeValue;
}

function matches(value: RuntimeValue, kind: ParamKind): boolean {
  switch (kind) {
    case ParamKind.Any:
      return true;
    case ParamKind.Number:
      return value.type === ValueType.Number;
    case ParamKind.String:
      return value.type === ValueType.String;
    case ParamKind.Bool:
      return value.type === ValueType.Bool;
    case ParamKind.Null:
      return value.type === ValueType.Null;
  }
}

function plural(count: number): string {
  return count === 1 ? "argument" : "arguments";
}

/**
 * Read-only view of the arguments of one call.
 */
export class Arguments {
  constructor(private readonly values: readonly RuntimeValue[]) {}

  get length(): number {
    return this.values.length;
  }

  has(index: number): boolean {
    return index >= 0 && index < this.values.length;
  }

  asAny(index: number): RuntimeValue {
    const value = this.values[index];
    if (value === undefined) {
      throw new ArityError(`missing argument ${index + 1}`);
    }
    return value;
  }

  asNumber(index: number): number {
    const value = this.asAny(index);
    if (value.type !== ValueType.Number) {
      throw this.mismatch(index, ParamKind.Number, value);
    }
    return value.value;
  }

  asString(index: number): string {
    const value = this.asAny(index);
    if (value.type !== ValueType.String) {
      throw this.mismatch(index, ParamKind.String, value);
    }
    return value.value;
  }

  asBool(index: number): boolean {
    const value = this.asAny(index);
    if (value.type !== ValueType.Bool) {
      throw this.mismatch(index, ParamKind.Bool, value);
    }
    return value.value;
  }

  private mismatch(index: number, expected: ParamKind, got: RuntimeValue): ValueTypeError {
    return new ValueTypeError(`argument ${index + 1} must be ${expected}, got ${typeName(got)}`);
  }
}

/**
 * Registry of native functions. Entries are added, never removed.
 */
export class FunctionRegistry {
  private functions: Map<string, NativeFunction> = new Map();

  /**
   * Add a function. Names must be unique and the signature consistent.
   */
  register(fn: NativeFunction): void {
    if (this.functions.has(fn.name)) {
      throw new NameError(`function '${fn.name}' is already registered`);
    }
    if (fn.arity.kind === "exact" && fn.arity.count !== fn.params.length) {
      throw new Error(
        `function '${fn.name}' declares ${fn.arity.count} ${plural(fn.arity.count)} but ${fn.params.length} parameter kinds`
      );
    }
    if (fn.arity.kind === "variadic" && fn.params.length === 0) {
      throw new Error(`variadic function '${fn.name}' needs at least one parameter kind`);
    }
    this.functions.set(fn.name, fn);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  get(name: string): NativeFunction | undefined {
    return this.functions.get(name);
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.functions.keys()];
  }

  /**
   * Look up, check and invoke a function.
   */
  call(name: string, args: RuntimeValue[]): RuntimeValue {
    const fn = this.functions.get(name);
    if (fn === undefined) {
      throw new NameError(`function '${name}' is not defined`);
    }

    const arity = fn.arity;
    if (arity.kind === "exact" && args.length !== arity.count) {
      throw new ArityError(`${name}() expects ${arity.count} ${plural(arity.count)}, got ${args.length}`);
    }
    if (arity.kind === "variadic" && args.length < arity.min) {
      throw new ArityError(`${name}() expects at least ${arity.min} ${plural(arity.min)}, got ${args.length}`);
    }

    args.forEach((arg, i) => {
      const kind = fn.params[Math.min(i, fn.params.length - 1)];
      if (kind !== undefined && !matches(arg, kind)) {
        throw new ValueTypeError(`argument ${i + 1} of ${name}() must be ${kind}, got ${typeName(arg)}`);
      }
    });

    return fn.call(new Arguments(args));
  }
}
