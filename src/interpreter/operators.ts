/**
 * Operator semantics over runtime values.
 */

import { ArithmeticError, ValueTypeError } from "../errors/errors.js";
import {
  ValueType,
  NumberValue,
  StringValue,
  toBool,
  typeName,
  type RuntimeValue,
} from "../object/object.js";
import type { InfixOperator, PrefixOperator } from "../ast/nodes.js";

function unsupported(op: string, left: RuntimeValue, right: RuntimeValue): ValueTypeError {
  return new ValueTypeError(`unsupported operand types for ${op}: ${typeName(left)} and ${typeName(right)}`);
}

/**
 * Repeat a string `trunc(count)` times, bounded by maxLength.
 */
function repeat(text: string, count: number, maxLength: number): StringValue {
  if (!Number.isFinite(count) || count < 0) {
    throw new ValueTypeError(`string repeat count must be a non-negative finite number, got ${count}`);
  }
  const times = Math.trunc(count);
  if (text.length * times > maxLength) {
    throw new ValueTypeError(`string repeat result exceeds ${maxLength} characters`);
  }
  return new StringValue(text.repeat(times));
}

function add(left: RuntimeValue, right: RuntimeValue): RuntimeValue {
  if (left.type === ValueType.Number && right.type === ValueType.Number) {
    return new NumberValue(left.value + right.value);
  }
  if (
    (left.type === ValueType.String || left.type === ValueType.Number) &&
    (right.type === ValueType.String || right.type === ValueType.Number)
  ) {
    return new StringValue(left.display() + right.display());
  }
  throw unsupported("+", left, right);
}

function multiply(left: RuntimeValue, right: RuntimeValue, maxLength: number): RuntimeValue {
  if (left.type === ValueType.Number && right.type === ValueType.Number) {
    return new NumberValue(left.value * right.value);
  }
  if (left.type === ValueType.String && right.type === ValueType.Number) {
    return repeat(left.value, right.value, maxLength);
  }
  if (left.type === ValueType.Number && right.type === ValueType.String) {
    return repeat(right.value, left.value, maxLength);
  }
  throw unsupported("*", left, right);
}

/**
 * Apply a binary operator. `maxLength` bounds string repetition.
 */
export function applyInfix(
  op: InfixOperator,
  left: RuntimeValue,
  right: RuntimeValue,
  maxLength: number
): RuntimeValue {
  switch (op) {
    case "+":
      return add(left, right);
    case "*":
      return multiply(left, right, maxLength);
  }

  if (left.type !== ValueType.Number || right.type !== ValueType.Number) {
    throw unsupported(op, left, right);
  }
  const l = left.value;
  const r = right.value;

  switch (op) {
    case "-":
      return new NumberValue(l - r);
    case "/":
      if (r === 0) {
        throw new ArithmeticError("division by zero");
      }
      return new NumberValue(l / r);
    case "^":
      return new NumberValue(Math.pow(l, r));
    case ">":
      return toBool(l > r);
    case "<":
      return toBool(l < r);
  }
}

/**
 * Apply a sign: multiplication by +1 or -1 under the `*` rules.
 */
export function applyPrefix(op: PrefixOperator, operand: RuntimeValue, maxLength: number): RuntimeValue {
  return multiply(operand, new NumberValue(op === "-" ? -1 : 1), maxLength);
}
