/**
 * MCP tool surface
 *
 * Five tools over a DatabaseInspector. Every result is one text item with
 * the outcome as pretty JSON.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import type { DatabaseInspector } from "./inspector.js";
import { toJsonText } from "./utils.js";

export const SERVER_NAME = "dbscout-mcp";
export const SERVER_VERSION = "0.1.0";

export const TOOL_NAMES = [
  "execute_query",
  "get_table_schema",
  "list_databases",
  "get_database_info",
  "get_all_tables_schemas",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

// A type alias, not an interface: the SDK's result type carries an index signature
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: "text", text }], isError: true }
    : { content: [{ type: "text", text }] };
}

/**
 * Fixed message naming the absent or empty required arguments.
 */
export function missingArgumentMessage(args: Record<string, string | undefined>): string {
  const missing = Object.entries(args)
    .filter(([, value]) => !value)
    .map(([name]) => name);
  return `Error: missing required argument(s): ${missing.join(", ")}`;
}

async function run(tool: ToolName, action: () => Promise<unknown>): Promise<ToolResult> {
  try {
    return textResult(toJsonText(await action()));
  } catch (error) {
    console.error(`[dbscout] Tool ${tool} failed: ${errorMessage(error)}`);
    return textResult(`Error: ${errorMessage(error)}`, true);
  }
}

/**
 * Plain-argument handlers, one per tool. The MCP registration below and
 * the tests both call these.
 */
export function createToolHandlers(inspector: DatabaseInspector) {
  return {
    execute_query: async ({ query, database }: { query?: string; database?: string }) => {
      if (!query || !database) return textResult(missingArgumentMessage({ query, database }));
      return run("execute_query", () => inspector.executeQuery(query, database));
    },

    get_table_schema: async ({ table_name, database }: { table_name?: string; database?: string }) => {
      if (!table_name || !database) {
        return textResult(missingArgumentMessage({ table_name, database }));
      }
      return run("get_table_schema", () => inspector.getTableSchema(table_name, database));
    },

    list_databases: async () => run("list_databases", () => inspector.listDatabases()),

    get_database_info: async ({ database }: { database?: string }) => {
      if (!database) return textResult(missingArgumentMessage({ database }));
      return run("get_database_info", () => inspector.getDatabaseInfo(database));
    },

    get_all_tables_schemas: async ({ database }: { database?: string }) => {
      if (!database) return textResult(missingArgumentMessage({ database }));
      return run("get_all_tables_schemas", () => inspector.getAllTableSchemas(database));
    },
  } satisfies Record<ToolName, (args: never) => Promise<ToolResult>>;
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;

// ============================================================================
// SERVER
// ============================================================================

export function createServer(inspector: DatabaseInspector): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  const handlers = createToolHandlers(inspector);
  const names = inspector.registry.names();
  const databaseHint = names.length > 0 ? ` (configured: ${names.join(", ")})` : "";

  server.tool(
    "execute_query",
    "Run a read-only SQL query (SELECT, WITH, EXPLAIN, SHOW, DESCRIBE, VALUES) against a configured database",
    {
      query: z.string().describe("SQL query; statements that modify data or schema are rejected"),
      database: z.string().describe(`Logical database name${databaseHint}`),
    },
    async (args) => handlers.execute_query(args)
  );

  server.tool(
    "get_table_schema",
    "Get the columns and indexes of a table (cached after the first lookup)",
    {
      table_name: z.string().describe("Table name"),
      database: z.string().describe(`Logical database name${databaseHint}`),
    },
    async (args) => handlers.get_table_schema(args)
  );

  server.tool(
    "list_databases",
    "List every configured database with its availability, size and table count",
    {},
    async () => handlers.list_databases()
  );

  server.tool(
    "get_database_info",
    "Get details of one database: version, size and the tables of the public schema by size",
    {
      database: z.string().describe(`Logical database name${databaseHint}`),
    },
    async (args) => handlers.get_database_info(args)
  );

  server.tool(
    "get_all_tables_schemas",
    "Get the columns and indexes of every table in the public schema of a database",
    {
      database: z.string().describe(`Logical database name${databaseHint}`),
    },
    async (args) => handlers.get_all_tables_schemas(args)
  );

  return server;
}
