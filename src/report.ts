/**
 * Console reports for the --list-databases and --test modes.
 */

import type { DatabaseInspector } from "./inspector.js";
import type { DatabaseStatus } from "./types.js";
import { formatBytes } from "./utils.js";

export type Writer = (line: string) => void;

export function formatStatusLines(name: string, status: DatabaseStatus): string[] {
  if (!status.available) {
    return [`  ❌ ${name}`, `      └─ Error: ${status.error}`];
  }
  const { host, database } = status.connection;
  return [
    `  ✅ ${name}`,
    `      └─ ${host} / ${database} (${formatBytes(status.sizeBytes)}, ${status.tablesCount} tables)`,
  ];
}

export async function printDatabaseList(inspector: DatabaseInspector, write: Writer): Promise<void> {
  const statuses = await inspector.listDatabases();
  const entries = Object.entries(statuses);

  write("Configured databases:");
  for (const [name, status] of entries) {
    formatStatusLines(name, status).forEach((line) => write(line));
  }
  write("");
  write(`Total: ${entries.length}`);
}

/**
 * Returns true when every configured database answered.
 */
export async function runConnectionTest(inspector: DatabaseInspector, write: Writer): Promise<boolean> {
  write("Testing connections...");
  const statuses = await inspector.listDatabases();
  const entries = Object.entries(statuses);
  let working = 0;

  for (const [name, status] of entries) {
    if (status.available) working++;
    formatStatusLines(name, status).forEach((line) => write(line));
  }

  write("");
  write(`Result: ${working}/${entries.length} connections working`);
  return working === entries.length;
}
