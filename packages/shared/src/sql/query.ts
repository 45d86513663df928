import type { Database, PreparedStatement } from "../db.js";
import { BindError } from "../errors.js";
import { decodeRow, type RowShape } from "./columns.js";
import { type Bindable, MAX_BIND_PARAMETERS, toSqlValue } from "./values.js";

/**
 * Bind `args` positionally (1-based, left to right) onto `statement`. An
 * argument with no parameter slot to go to is a `BindError`.
 */
export function bindAll(
  statement: PreparedStatement,
  args: readonly Bindable[],
): void {
  if (args.length > MAX_BIND_PARAMETERS) {
    throw new BindError(
      `Too many arguments: ${args.length} (at most ${MAX_BIND_PARAMETERS})`,
      MAX_BIND_PARAMETERS + 1,
    );
  }
  args.forEach((arg, i) => {
    statement.bind(i + 1, toSqlValue(arg, i + 1));
  });
}

/**
 * Prepare, bind, execute and decode a statement in one call.
 *
 * Without a shape the statement's rows, if any, are discarded. With a shape
 * each row is decoded into it, in the order the engine produced them. The
 * prepared statement is finalized on every exit path.
 */
export function query(
  db: Database,
  sql: string,
  args?: readonly Bindable[],
): Promise<void>;
export function query<T>(
  db: Database,
  sql: string,
  args: readonly Bindable[],
  shape: RowShape<T>,
): Promise<T[]>;
export async function query<T>(
  db: Database,
  sql: string,
  args: readonly Bindable[] = [],
  shape?: RowShape<T>,
): Promise<T[] | void> {
  const statement = db.prepare(sql);

  try {
    bindAll(statement, args);
    const result = await statement.step();

    if (!shape) {
      return;
    }
    return result.rows.map((row) => decodeRow(shape, row));
  } finally {
    statement.finalize();
  }
}
