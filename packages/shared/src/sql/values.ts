import type { InValue } from "@libsql/client";
import { BindError } from "../errors.js";

/** SQLite's limit on host parameters in a single statement. */
export const MAX_BIND_PARAMETERS = 32766;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * A value tagged with the storage class it binds as.
 */
export type SqlValue =
  | { type: "integer"; value: bigint }
  | { type: "real"; value: number }
  | { type: "text"; value: string }
  | { type: "blob"; value: Uint8Array }
  | { type: "null" };

/**
 * Everything `query` accepts as an argument. Anything else is a type error at
 * the call site.
 */
export type Bindable =
  | number
  | bigint
  | string
  | Uint8Array
  | null
  | undefined
  | SqlValue;

export const sqlInteger = (value: bigint | number): SqlValue => ({
  type: "integer",
  value: BigInt(value),
});

export const sqlReal = (value: number): SqlValue => ({ type: "real", value });

/**
 * Classify a bindable argument into the storage class it will be bound as.
 *
 * @param position - 1-based parameter slot, used in error messages
 */
export function toSqlValue(arg: Bindable, position: number): SqlValue {
  if (arg === null || arg === undefined) {
    return { type: "null" };
  }

  if (arg instanceof Uint8Array) {
    return { type: "blob", value: arg };
  }

  switch (typeof arg) {
    case "bigint":
      return checkInteger(arg, position);
    case "number":
      if (!Number.isFinite(arg)) {
        throw new BindError(
          `Cannot bind non-finite number ${arg} at parameter ${position}`,
          position,
        );
      }
      return Number.isSafeInteger(arg)
        ? { type: "integer", value: BigInt(arg) }
        : { type: "real", value: arg };
    case "string":
      return { type: "text", value: arg };
    default:
      return checkTagged(arg, position);
  }
}

function checkInteger(value: bigint, position: number): SqlValue {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new BindError(
      `Integer ${value} at parameter ${position} does not fit in 64 bits`,
      position,
    );
  }
  return { type: "integer", value };
}

function checkTagged(value: SqlValue, position: number): SqlValue {
  switch (value.type) {
    case "integer":
      return checkInteger(value.value, position);
    case "real":
      if (!Number.isFinite(value.value)) {
        throw new BindError(
          `Cannot bind non-finite number ${value.value} at parameter ${position}`,
          position,
        );
      }
      return value;
    case "text":
    case "blob":
    case "null":
      return value;
  }
}

/**
 * Convert a classified value into what the libsql driver binds.
 * Integers travel as bigint so the driver never binds them as doubles.
 */
export function toDriverValue(value: SqlValue): InValue {
  return value.type === "null" ? null : value.value;
}
