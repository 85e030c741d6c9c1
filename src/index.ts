#!/usr/bin/env node
/**
 * dbscout-mcp
 * Read-only MCP server for several PostgreSQL databases
 *
 * @license MIT
 */

import { Command } from "commander";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CONFIG_ENV_VAR, loadConfig } from "./config.js";
import { CONNECT_TIMEOUT_MS, ConnectionRegistry } from "./connections.js";
import { errorMessage } from "./errors.js";
import { DatabaseInspector } from "./inspector.js";
import { printDatabaseList, runConnectionTest } from "./report.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./tools.js";

type CliOptions = {
  config?: string;
  listDatabases?: boolean;
  test?: boolean;
};

const TOOLS_HELP = `
MCP tools:
  execute_query           Run a SELECT/WITH/EXPLAIN/SHOW/VALUES query
  get_table_schema        Columns and indexes of one table (cached)
  list_databases          Every configured database and its status
  get_database_info       Version, size and tables of one database
  get_all_tables_schemas  Columns and indexes of every public table

Configuration (first found wins):
  --config <path>, $${CONFIG_ENV_VAR}, ./dbscout.json, ./.dbscout.json,
  $XDG_CONFIG_HOME/dbscout/config.json (default ~/.config/dbscout/config.json)
`;

const program = new Command()
  .name(SERVER_NAME)
  .description("Read-only MCP server for inspecting and querying PostgreSQL databases")
  .version(SERVER_VERSION)
  .option("-c, --config <path>", "path to the JSON config file")
  .option("--list-databases", "show every configured database and its connection status")
  .option("--test", "check the connection to every configured database")
  .addHelpText("after", TOOLS_HELP);

let server: McpServer | undefined;

async function main(): Promise<void> {
  program.parse(process.argv);
  const options = program.opts<CliOptions>();

  const config = loadConfig({ configPath: options.config });
  const registry = new ConnectionRegistry(config.databases);
  const inspector = new DatabaseInspector(registry);
  const print = (line: string) => console.log(line);

  if (options.listDatabases) {
    await printDatabaseList(inspector, print);
    return;
  }

  if (options.test) {
    const allWorking = await runConnectionTest(inspector, print);
    process.exitCode = allWorking ? 0 : 1;
    return;
  }

  server = createServer(inspector);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`[dbscout] Running on stdio (${SERVER_NAME} ${SERVER_VERSION})`);
  console.error(`[dbscout] Databases: ${registry.names().join(", ") || "(none)"}`);
  console.error(`[dbscout] Connect timeout: ${CONNECT_TIMEOUT_MS}ms, one connection per call`);
}

async function shutdown(): Promise<void> {
  try {
    await server?.close();
  } catch (error) {
    console.error(`[dbscout] Error during shutdown: ${errorMessage(error)}`);
  }
  process.exit(0);
}

main().catch((error) => {
  console.error(`[dbscout] Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
