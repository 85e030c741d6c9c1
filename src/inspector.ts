/**
 * DatabaseInspector: the five read-only operations behind the MCP tools.
 *
 * No method rejects. Every failure, from an unknown database name to an
 * engine error, comes back as an outcome with `success: false` (or
 * `available: false` in list_databases) and an `errorType`.
 *
 * Query execution has no application-level timeout; a long statement runs
 * until the server's own statement_timeout, if any, stops it.
 */

import {
  ConnectionRegistry,
  ConnectionResolver,
  summarizeProfile,
  type ClientFactory,
  type DbClient,
} from "./connections.js";
import { DbToolError, toDbToolError, type ErrorKind } from "./errors.js";
import {
  DATABASE_STATUS_SQL,
  DEFAULT_SCHEMA,
  SCHEMA_COLUMNS_SQL,
  SCHEMA_INDEXES_SQL,
  TABLE_COLUMNS_SQL,
  TABLE_INDEXES_SQL,
  TABLE_SIZES_SQL,
} from "./queries.js";
import { SchemaCache } from "./schema-cache.js";
import type {
  AllTableSchemasOutcome,
  ColumnDescriptor,
  ConnectionProfile,
  DatabaseInfoOutcome,
  DatabaseStatus,
  DatabaseStatusInfo,
  IndexDescriptor,
  QueryOutcome,
  Row,
  SchemaCacheEntry,
  TableSchema,
  TableSchemaOutcome,
} from "./types.js";
import { formatDuration, secondsSince, toNumberOrNull } from "./utils.js";
import { checkQuery } from "./validator.js";

export const DISALLOWED_QUERY_MESSAGE = "Query contains disallowed operations";

export interface DatabaseInspectorOptions {
  clientFactory?: ClientFactory;
  connectTimeoutMs?: number;
  cache?: SchemaCache;
  /** Clock for cache timestamps, epoch ms */
  now?: () => number;
}

// ============================================================================
// ROW MAPPING
// ============================================================================

function optionalString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function toColumnDescriptor(row: Row): ColumnDescriptor {
  return {
    name: String(row.column_name),
    dataType: String(row.data_type),
    isNullable: row.is_nullable === "YES",
    defaultExpression: optionalString(row.column_default),
    maxLength: toNumberOrNull(row.character_maximum_length),
    numericPrecision: toNumberOrNull(row.numeric_precision),
    numericScale: toNumberOrNull(row.numeric_scale),
  };
}

export function toIndexDescriptor(row: Row): IndexDescriptor {
  return {
    name: String(row.indexname),
    definition: String(row.indexdef),
  };
}

/**
 * Group catalog rows by owning table. A table present in only one of the
 * two lists still gets an entry, with the other list empty.
 */
export function groupTableSchemas(columnRows: Row[], indexRows: Row[]): Record<string, TableSchema> {
  const tables = new Map<string, TableSchema>();

  const tableFor = (name: string): TableSchema => {
    let table = tables.get(name);
    if (!table) {
      table = { columns: [], indexes: [] };
      tables.set(name, table);
    }
    return table;
  };

  for (const row of columnRows) {
    tableFor(String(row.table_name)).columns.push(toColumnDescriptor(row));
  }
  for (const row of indexRows) {
    tableFor(String(row.tablename)).indexes.push(toIndexDescriptor(row));
  }

  return Object.fromEntries(tables);
}

// ============================================================================
// INSPECTOR
// ============================================================================

export class DatabaseInspector {
  readonly resolver: ConnectionResolver;
  readonly cache: SchemaCache;
  private readonly now: () => number;

  constructor(
    readonly registry: ConnectionRegistry,
    options: DatabaseInspectorOptions = {}
  ) {
    this.resolver = new ConnectionResolver(registry, {
      clientFactory: options.clientFactory,
      connectTimeoutMs: options.connectTimeoutMs,
    });
    this.cache = options.cache ?? new SchemaCache();
    this.now = options.now ?? Date.now;
  }

  /**
   * Validate and run arbitrary read-only SQL.
   */
  async executeQuery(sql: string, database: string): Promise<QueryOutcome> {
    const check = checkQuery(sql);
    if (!check.allowed) {
      console.error(`[dbscout] Rejected query for ${database}: ${check.reason}`);
      return {
        success: false,
        error: DISALLOWED_QUERY_MESSAGE,
        errorType: "disallowed_query",
        rowCount: 0,
        executionTimeSeconds: 0,
        databaseName: database,
      };
    }

    const start = Date.now();
    try {
      const { rows, seconds } = await this.resolver.withConnection(database, async (client) => {
        const queryStart = Date.now();
        const result = await client.query(sql);
        return { rows: result.rows, seconds: secondsSince(queryStart) };
      });

      console.error(
        `[dbscout] Query on ${database}: ${rows.length} row(s) in ${formatDuration(seconds * 1000)}`
      );
      return {
        success: true,
        data: rows,
        rowCount: rows.length,
        executionTimeSeconds: seconds,
        databaseName: database,
      };
    } catch (error) {
      const failure = this.fail(error, "execution_failure", database);
      return {
        success: false,
        error: failure.message,
        errorType: failure.kind,
        rowCount: 0,
        executionTimeSeconds: failure.kind === "unknown_database" ? 0 : secondsSince(start),
        databaseName: database,
      };
    }
  }

  /**
   * Columns and indexes of one table, served from the cache after the
   * first successful lookup. The cached answer stands until restart, even
   * if the table is later created, altered or dropped.
   */
  async getTableSchema(table: string, database: string): Promise<TableSchemaOutcome> {
    try {
      this.resolver.resolve(database);
      const entry = await this.cache.getOrCompute(database, table, () =>
        this.resolver.withConnection(database, (client) => this.introspectTable(client, table))
      );
      return {
        success: true,
        databaseName: database,
        tableName: table,
        columns: entry.columns,
        indexes: entry.indexes,
        cachedAt: new Date(entry.cachedAt).toISOString(),
      };
    } catch (error) {
      const failure = this.fail(error, "introspection_failure", database);
      return {
        success: false,
        error: failure.message,
        errorType: failure.kind,
        databaseName: database,
        tableName: table,
      };
    }
  }

  /**
   * Status of every configured database. One unreachable database does
   * not affect the others.
   */
  async listDatabases(): Promise<Record<string, DatabaseStatus>> {
    const statuses = await Promise.all(
      this.registry
        .entries()
        .map(async ([name, profile]) => [name, await this.databaseStatus(name, profile)] as const)
    );
    return Object.fromEntries(statuses);
  }

  async getDatabaseInfo(database: string): Promise<DatabaseInfoOutcome> {
    const profile = this.registry.get(database);
    const connection = profile ? summarizeProfile(profile) : undefined;

    try {
      const { info, tables } = await this.resolver.withConnection(database, async (client) => {
        const info = await this.fetchStatus(client);
        const { rows } = await client.query(TABLE_SIZES_SQL, [DEFAULT_SCHEMA]);
        return {
          info,
          tables: rows.map((row) => ({ tableName: String(row.table_name), size: String(row.size) })),
        };
      });

      return {
        success: true,
        databaseName: database,
        info,
        tables,
        tablesCount: tables.length,
        connection: summarizeProfile(this.resolver.resolve(database)),
      };
    } catch (error) {
      const failure = this.fail(error, "introspection_failure", database);
      return {
        success: false,
        error: failure.message,
        errorType: failure.kind,
        databaseName: database,
        ...(connection ? { connection } : {}),
      };
    }
  }

  /**
   * Every table of the public schema in two catalog queries.
   */
  async getAllTableSchemas(database: string): Promise<AllTableSchemasOutcome> {
    try {
      const tables = await this.resolver.withConnection(database, async (client) => {
        const columns = await client.query(SCHEMA_COLUMNS_SQL, [DEFAULT_SCHEMA]);
        const indexes = await client.query(SCHEMA_INDEXES_SQL, [DEFAULT_SCHEMA]);
        return groupTableSchemas(columns.rows, indexes.rows);
      });

      return {
        success: true,
        databaseName: database,
        tables,
        tablesCount: Object.keys(tables).length,
      };
    } catch (error) {
      const failure = this.fail(error, "introspection_failure", database);
      return {
        success: false,
        error: failure.message,
        errorType: failure.kind,
        databaseName: database,
      };
    }
  }

  // --------------------------------------------------------------------------

  // An absent table yields empty lists and is cached like any other answer
  private async introspectTable(client: DbClient, table: string): Promise<SchemaCacheEntry> {
    const columns = await client.query(TABLE_COLUMNS_SQL, [table]);
    const indexes = await client.query(TABLE_INDEXES_SQL, [table]);

    return {
      columns: columns.rows.map(toColumnDescriptor),
      indexes: indexes.rows.map(toIndexDescriptor),
      cachedAt: this.now(),
    };
  }

  private async fetchStatus(client: DbClient): Promise<DatabaseStatusInfo> {
    const { rows } = await client.query(DATABASE_STATUS_SQL, [DEFAULT_SCHEMA]);
    const row = rows[0];
    if (!row) {
      throw new DbToolError("introspection_failure", "Status query returned no rows");
    }
    return {
      databaseName: String(row.database_name),
      currentUser: String(row.current_user),
      version: String(row.version),
      sizeBytes: toNumberOrNull(row.size_bytes) ?? 0,
      tablesCount: toNumberOrNull(row.tables_count) ?? 0,
    };
  }

  private async databaseStatus(name: string, profile: ConnectionProfile): Promise<DatabaseStatus> {
    const connection = summarizeProfile(profile);
    try {
      const info = await this.resolver.withConnection(name, (client) => this.fetchStatus(client));
      return { available: true, ...info, connection };
    } catch (error) {
      const failure = this.fail(error, "introspection_failure", name);
      return { available: false, error: failure.message, errorType: failure.kind, connection };
    }
  }

  private fail(error: unknown, fallback: ErrorKind, database: string): DbToolError {
    const failure = toDbToolError(error, fallback, { database });
    console.error(`[dbscout] ${failure.kind} (${database}): ${failure.message}`);
    return failure;
  }
}
