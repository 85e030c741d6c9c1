/**
 * Catalog queries used by the inspector. All introspection is limited to
 * the public schema except the single-table lookup, which matches the
 * table name in any schema.
 */

export const DEFAULT_SCHEMA = "public";

export const DATABASE_STATUS_SQL = `
  SELECT
    current_database() AS database_name,
    current_user AS current_user,
    version() AS version,
    pg_database_size(current_database()) AS size_bytes,
    (
      SELECT COUNT(*)
      FROM information_schema.tables
      WHERE table_schema = $1
    ) AS tables_count
`;

export const TABLE_SIZES_SQL = `
  SELECT
    tablename AS table_name,
    pg_size_pretty(pg_total_relation_size(quote_ident(schemaname) || '.' || quote_ident(tablename))) AS size
  FROM pg_tables
  WHERE schemaname = $1
  ORDER BY pg_total_relation_size(quote_ident(schemaname) || '.' || quote_ident(tablename)) DESC
`;

export const TABLE_COLUMNS_SQL = `
  SELECT
    column_name,
    data_type,
    is_nullable,
    column_default,
    character_maximum_length,
    numeric_precision,
    numeric_scale
  FROM information_schema.columns
  WHERE table_name = $1
  ORDER BY ordinal_position
`;

export const TABLE_INDEXES_SQL = `
  SELECT indexname, indexdef
  FROM pg_indexes
  WHERE tablename = $1
`;

export const SCHEMA_COLUMNS_SQL = `
  SELECT
    table_name,
    column_name,
    data_type,
    is_nullable,
    column_default,
    character_maximum_length,
    numeric_precision,
    numeric_scale
  FROM information_schema.columns
  WHERE table_schema = $1
  ORDER BY table_name, ordinal_position
`;

export const SCHEMA_INDEXES_SQL = `
  SELECT tablename, indexname, indexdef
  FROM pg_indexes
  WHERE schemaname = $1
  ORDER BY tablename, indexname
`;
