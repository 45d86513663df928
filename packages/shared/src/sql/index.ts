export {
  bigInteger,
  blob,
  type ColumnType,
  decodeRow,
  integer,
  optional,
  real,
  type RowOf,
  type RowShape,
  row,
  type StorageClass,
  storageClassOf,
  text,
} from "./columns.js";
export { bindAll, query } from "./query.js";
export { type SqlScan, scanSql } from "./scan.js";
export {
  type Bindable,
  MAX_BIND_PARAMETERS,
  type SqlValue,
  sqlInteger,
  sqlReal,
  toSqlValue,
} from "./values.js";
