import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DatabaseInspector } from "../src/inspector.js";
import { printDatabaseList, runConnectionTest } from "../src/report.js";
import { fakeHosts, rows, testRegistry, type FakeHost } from "./helpers/fake-client.js";

const reachable = (database: string): FakeHost => ({
  handler: () =>
    rows({
      database_name: database,
      current_user: "reader",
      version: "PostgreSQL 16.2",
      size_bytes: "8192",
      tables_count: "3",
    }),
});

const refused: FakeHost = { connectError: new Error("connect ECONNREFUSED 10.0.0.7:5432") };

function inspectorFor(hosts: Record<string, FakeHost>): DatabaseInspector {
  return new DatabaseInspector(testRegistry(), { clientFactory: fakeHosts(hosts).factory });
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("printDatabaseList", () => {
  it("prints one block per database and a total", async () => {
    const lines: string[] = [];
    const inspector = inspectorFor({ "db-main": reachable("main"), "db-reports": refused });

    await printDatabaseList(inspector, (line) => lines.push(line));

    expect(lines).toEqual([
      "Configured databases:",
      "  ✅ main",
      "      └─ db-main / main (8.0 KB, 3 tables)",
      "  ❌ reports",
      '      └─ Error: Failed to connect to database "reports": connect ECONNREFUSED 10.0.0.7:5432',
      "",
      "Total: 2",
    ]);
  });
});

describe("runConnectionTest", () => {
  it("counts working connections and fails when one is down", async () => {
    const lines: string[] = [];
    const inspector = inspectorFor({ "db-main": reachable("main"), "db-reports": refused });

    const ok = await runConnectionTest(inspector, (line) => lines.push(line));

    expect(ok).toBe(false);
    expect(lines[0]).toBe("Testing connections...");
    expect(lines[lines.length - 1]).toBe("Result: 1/2 connections working");
  });

  it("passes when every database answers", async () => {
    const lines: string[] = [];
    const inspector = inspectorFor({
      "db-main": reachable("main"),
      "db-reports": reachable("reports_prod"),
    });

    await expect(runConnectionTest(inspector, (line) => lines.push(line))).resolves.toBe(true);
    expect(lines).toContain("      └─ db-reports / reports_prod (8.0 KB, 3 tables)");
    expect(lines[lines.length - 1]).toBe("Result: 2/2 connections working");
  });
});
