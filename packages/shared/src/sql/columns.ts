import type { Value } from "@libsql/client";
import { z } from "zod";
import { DecodeTypeError } from "../errors.js";

/**
 * Column decoders and row shapes.
 *
 * A row shape wraps a zod object whose fields are column types, declared in the
 * same order as the statement's result columns:
 *
 * @example
 * ```ts
 * const todoRow = row({
 *   id: integer(),
 *   description: text(),
 *   completedAt: optional(text()),
 * });
 *
 * // Array<{ id: number; description: string; completedAt: string | null }>
 * const todos = await query(db, "SELECT id, description, completed_at FROM todo", [], todoRow);
 * ```
 */

export type StorageClass = "null" | "integer" | "real" | "text" | "blob";

/** A decoder from one column value to a field of type `T`. */
export type ColumnType<T> = z.ZodType<T, z.ZodTypeDef, Value>;

/** Result row layout: field names in column order plus their decoders. */
export interface RowShape<T> {
  readonly fields: readonly string[];
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export type RowOf<S> = S extends RowShape<infer T> ? T : never;

const textDecoder = new TextDecoder("utf-8", { fatal: true });
const textEncoder = new TextEncoder();

/**
 * The storage class of a value as returned by the driver. Integers arrive as
 * bigint because the handle opens the client with `intMode: "bigint"`.
 */
export function storageClassOf(value: Value): StorageClass {
  if (value === null) return "null";
  if (typeof value === "bigint") return "integer";
  if (typeof value === "number") return "real";
  if (typeof value === "string") return "text";
  return "blob";
}

function isValue(value: unknown): value is Value {
  return (
    value === null ||
    typeof value === "bigint" ||
    typeof value === "number" ||
    typeof value === "string" ||
    value instanceof ArrayBuffer
  );
}

const columnValue = z.custom<Value>(isValue, {
  message: "Expected a SQLite column value",
});

function mismatch(ctx: z.RefinementCtx, expected: string, value: Value) {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `expected ${expected}, found ${storageClassOf(value)}`,
  });
  return z.NEVER;
}

export function integer(): ColumnType<number> {
  return columnValue.transform((value, ctx) => {
    if (typeof value === "bigint") {
      const n = Number(value);
      if (!Number.isSafeInteger(n)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `integer ${value} exceeds the safe range, use bigInteger()`,
        });
        return z.NEVER;
      }
      return n;
    }
    if (typeof value === "number") return Math.trunc(value);
    return mismatch(ctx, "integer", value);
  });
}

export function bigInteger(): ColumnType<bigint> {
  return columnValue.transform((value, ctx) => {
    if (typeof value === "bigint") return value;
    if (typeof value === "number") return BigInt(Math.trunc(value));
    return mismatch(ctx, "integer", value);
  });
}

export function real(): ColumnType<number> {
  return columnValue.transform((value, ctx) => {
    if (typeof value === "number") return value;
    if (typeof value === "bigint") return Number(value);
    return mismatch(ctx, "real", value);
  });
}

export function text(): ColumnType<string> {
  return columnValue.transform((value, ctx) => {
    if (typeof value === "string") return value;
    if (value instanceof ArrayBuffer) {
      try {
        return textDecoder.decode(value);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "blob is not valid UTF-8 text",
        });
        return z.NEVER;
      }
    }
    return mismatch(ctx, "text or blob", value);
  });
}

export function blob(): ColumnType<Uint8Array> {
  return columnValue.transform((value, ctx) => {
    // Copy so the result owns its bytes.
    if (value instanceof ArrayBuffer) return new Uint8Array(value.slice(0));
    if (typeof value === "string") return textEncoder.encode(value);
    return mismatch(ctx, "blob or text", value);
  });
}

/** SQL NULL decodes to `null`; anything else goes through `column`. */
export function optional<T>(column: ColumnType<T>): ColumnType<T | null> {
  return column.nullable();
}

/** Declare a row shape. Field order must match the result column order. */
export function row<F extends Record<string, ColumnType<unknown>>>(
  fields: F,
): RowShape<z.output<z.ZodObject<F, "strip">>> {
  return { fields: Object.keys(fields), schema: z.object(fields) };
}

/**
 * Decode one result row positionally into its shape.
 */
export function decodeRow<T>(
  shape: RowShape<T>,
  values: ArrayLike<Value>,
): T {
  const { fields } = shape;

  if (values.length < fields.length) {
    const missing = fields[values.length] ?? "";
    throw new DecodeTypeError(
      `Row has ${values.length} columns but shape expects ${fields.length} (missing '${missing}')`,
      missing,
      values.length,
    );
  }

  const record: Record<string, Value> = {};
  fields.forEach((field, index) => {
    record[field] = values[index] ?? null;
  });

  const parsed = shape.schema.safeParse(record);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = String(issue?.path[0] ?? "");
  const index = fields.indexOf(field);
  throw new DecodeTypeError(
    `Column ${index} ('${field}'): ${issue?.message ?? "invalid value"}`,
    field,
    index,
  );
}
