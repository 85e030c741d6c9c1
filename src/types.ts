/**
 * dbscout data model
 */

import type { ErrorKind } from "./errors.js";

export interface ConnectionProfile {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
  readonly ssl?: boolean;
}

/** Profile without the password, safe to echo back to callers. */
export interface ConnectionSummary {
  host: string;
  port: number;
  database: string;
  user: string;
}

export type Row = Record<string, unknown>;

export interface ColumnDescriptor {
  name: string;
  dataType: string;
  isNullable: boolean;
  defaultExpression: string | null;
  maxLength: number | null;
  numericPrecision: number | null;
  numericScale: number | null;
}

export interface IndexDescriptor {
  name: string;
  definition: string;
}

export interface SchemaCacheEntry {
  readonly columns: readonly ColumnDescriptor[];
  readonly indexes: readonly IndexDescriptor[];
  /** epoch milliseconds */
  readonly cachedAt: number;
}

interface Failure {
  success: false;
  error: string;
  errorType: ErrorKind;
}

// ---------------------------------------------------------------------------
// execute_query
// ---------------------------------------------------------------------------

export interface QuerySuccess {
  success: true;
  data: Row[];
  rowCount: number;
  executionTimeSeconds: number;
  databaseName: string;
}

export interface QueryFailure extends Failure {
  rowCount: 0;
  executionTimeSeconds: number;
  databaseName: string;
}

export type QueryOutcome = QuerySuccess | QueryFailure;

// ---------------------------------------------------------------------------
// get_table_schema
// ---------------------------------------------------------------------------

export interface TableSchemaSuccess {
  success: true;
  databaseName: string;
  tableName: string;
  columns: readonly ColumnDescriptor[];
  indexes: readonly IndexDescriptor[];
  /** ISO-8601 */
  cachedAt: string;
}

export interface TableSchemaFailure extends Failure {
  databaseName: string;
  tableName: string;
}

export type TableSchemaOutcome = TableSchemaSuccess | TableSchemaFailure;

// ---------------------------------------------------------------------------
// list_databases / get_database_info
// ---------------------------------------------------------------------------

export interface DatabaseStatusInfo {
  databaseName: string;
  currentUser: string;
  version: string;
  sizeBytes: number;
  tablesCount: number;
}

export type DatabaseStatus =
  | ({ available: true; connection: ConnectionSummary } & DatabaseStatusInfo)
  | { available: false; error: string; errorType: ErrorKind; connection: ConnectionSummary };

export interface TableSize {
  tableName: string;
  size: string;
}

export interface DatabaseInfoSuccess {
  success: true;
  databaseName: string;
  info: DatabaseStatusInfo;
  tables: TableSize[];
  tablesCount: number;
  connection: ConnectionSummary;
}

export interface DatabaseInfoFailure extends Failure {
  databaseName: string;
  connection?: ConnectionSummary;
}

export type DatabaseInfoOutcome = DatabaseInfoSuccess | DatabaseInfoFailure;

// ---------------------------------------------------------------------------
// get_all_tables_schemas
// ---------------------------------------------------------------------------

export interface TableSchema {
  columns: ColumnDescriptor[];
  indexes: IndexDescriptor[];
}

export interface AllTableSchemasSuccess {
  success: true;
  databaseName: string;
  tables: Record<string, TableSchema>;
  tablesCount: number;
}

export interface AllTableSchemasFailure extends Failure {
  databaseName: string;
}

export type AllTableSchemasOutcome = AllTableSchemasSuccess | AllTableSchemasFailure;
