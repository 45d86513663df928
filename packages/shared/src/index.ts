/**
 * @ticklist/shared - typed SQL layer and logging
 *
 * @example
 * ```ts
 * // Import specific modules
 * import { logger } from "@ticklist/shared/logger";
 * import { Database } from "@ticklist/shared/db";
 * import { query, row, integer, text } from "@ticklist/shared/sql";
 *
 * // Or import from main entry
 * import { Database, logger, query } from "@ticklist/shared";
 * ```
 */

export { Database, PreparedStatement, toDatabaseUrl } from "./db.js";
export {
  BindError,
  ConnectionError,
  DbError,
  DecodeTypeError,
  errorMessage,
  ExecutionError,
  PrepareError,
  StepError,
} from "./errors.js";
export {
  type LogContext,
  type Logger,
  type LogLevel,
  logger,
} from "./logger.js";
export * from "./sql/index.js";
