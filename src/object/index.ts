/**
 * Value module exports.
 */

export {
  ValueType,
  NullValue,
  BoolValue,
  NumberValue,
  StringValue,
  NULL,
  TRUE,
  FALSE,
  toBool,
  formatNumber,
  typeName,
  fromJS,
  toJS,
} from "./object.js";
export type { KestrelValue, RuntimeValue } from "./object.js";
