import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createPgClient } from "../src/connections.js";
import { profile } from "./helpers/fake-client.js";

type Listener = (error: Error) => void;

const driver = vi.hoisted(() => {
  const state: {
    config: unknown;
    result: unknown;
    calls: string[];
    params: unknown[] | undefined;
    listeners: Map<string, Listener>;
  } = {
    config: undefined,
    result: undefined,
    calls: [],
    params: undefined,
    listeners: new Map(),
  };
  return state;
});

vi.mock("pg", () => {
  class Client {
    constructor(config: unknown) {
      driver.config = config;
    }

    on(event: string, listener: Listener): this {
      driver.listeners.set(event, listener);
      return this;
    }

    async connect(): Promise<this> {
      driver.calls.push("connect");
      return this;
    }

    async query(text: string, params?: unknown[]): Promise<unknown> {
      driver.calls.push(`query ${text}`);
      driver.params = params;
      return driver.result;
    }

    async end(): Promise<void> {
      driver.calls.push("end");
    }
  }
  return { default: { Client } };
});

function result(...rows: Array<Record<string, unknown>>) {
  return { command: "SELECT", rowCount: rows.length, oid: 0, fields: [], rows };
}

beforeEach(() => {
  driver.config = undefined;
  driver.result = result();
  driver.calls = [];
  driver.params = undefined;
  driver.listeners.clear();
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createPgClient", () => {
  it("builds the driver client from the profile without connecting", () => {
    createPgClient(profile("db-main", "main"), { connectTimeoutMs: 1500 });

    expect(driver.config).toEqual({
      host: "db-main",
      port: 5432,
      database: "main",
      user: "reader",
      password: "test-secret",
      connectionTimeoutMillis: 1500,
      application_name: "dbscout-mcp",
    });
    expect(driver.calls).toEqual([]);
  });

  it("connects, queries and ends through the driver", async () => {
    driver.result = result({ answer: 42 });
    const client = createPgClient(profile("db-main", "main"), { connectTimeoutMs: 1500 });

    await expect(client.connect()).resolves.toBeUndefined();
    await expect(client.query("SELECT $1::int AS answer", [42])).resolves.toEqual({
      rows: [{ answer: 42 }],
    });
    await client.end();

    expect(driver.calls).toEqual(["connect", "query SELECT $1::int AS answer", "end"]);
    expect(driver.params).toEqual([42]);
  });

  it("keeps the rows of the last statement of a multi-statement query", async () => {
    driver.result = [result({ n: 1 }), result({ n: 2 }, { n: 3 })];
    const client = createPgClient(profile("db-main", "main"), { connectTimeoutMs: 1500 });

    await expect(client.query("SELECT 1 AS n; SELECT 2 AS n")).resolves.toEqual({
      rows: [{ n: 2 }, { n: 3 }],
    });
  });

  it("returns no rows for an empty result list", async () => {
    driver.result = [];
    const client = createPgClient(profile("db-main", "main"), { connectTimeoutMs: 1500 });

    await expect(client.query("")).resolves.toEqual({ rows: [] });
  });

  it("logs socket errors instead of letting them crash the process", () => {
    createPgClient(profile("db-main", "main"), { connectTimeoutMs: 1500 });

    const listener = driver.listeners.get("error");
    expect(listener).toBeDefined();
    listener?.(new Error("Connection terminated unexpectedly"));

    expect(console.error).toHaveBeenCalledWith(
      "[dbscout] Connection error (db-main/main): Connection terminated unexpectedly"
    );
  });
});
