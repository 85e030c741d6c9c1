/**
 * Connection registry and resolver
 *
 * One pg.Client per call, closed on every exit path. There is no pool and
 * no state shared between calls, so concurrent operations never contend on
 * a connection object.
 */

import pg from "pg";
import { DbToolError, errorMessage } from "./errors.js";
import type { ConnectionProfile, ConnectionSummary, Row } from "./types.js";
import { withTimeout } from "./utils.js";

export const CONNECT_TIMEOUT_MS = 10_000;
export const RELEASE_TIMEOUT_MS = 2_000;

// ============================================================================
// REGISTRY
// ============================================================================

/**
 * Logical database name -> connection profile. Read-only after construction.
 */
export class ConnectionRegistry {
  private readonly profiles: ReadonlyMap<string, ConnectionProfile>;

  constructor(profiles: Record<string, ConnectionProfile>) {
    this.profiles = new Map(Object.entries(profiles));
  }

  get(name: string): ConnectionProfile | undefined {
    return this.profiles.get(name);
  }

  names(): string[] {
    return Array.from(this.profiles.keys());
  }

  entries(): Array<[string, ConnectionProfile]> {
    return Array.from(this.profiles.entries());
  }
}

export function summarizeProfile(profile: ConnectionProfile): ConnectionSummary {
  return {
    host: profile.host,
    port: profile.port,
    database: profile.database,
    user: profile.user,
  };
}

// ============================================================================
// CLIENTS
// ============================================================================

export interface DbQueryResult {
  rows: Row[];
}

/**
 * The slice of a driver client the inspector needs.
 */
export interface DbClient {
  connect(): Promise<void>;
  query(text: string, params?: unknown[]): Promise<DbQueryResult>;
  end(): Promise<void>;
}

export type ClientFactory = (
  profile: ConnectionProfile,
  options: { connectTimeoutMs: number }
) => DbClient;

export const createPgClient: ClientFactory = (profile, options) => {
  const client = new pg.Client({
    host: profile.host,
    port: profile.port,
    database: profile.database,
    user: profile.user,
    password: profile.password,
    ssl: profile.ssl,
    connectionTimeoutMillis: options.connectTimeoutMs,
    application_name: "dbscout-mcp",
  });

  // Without a listener a dropped socket would crash the process
  client.on("error", (error) => {
    console.error(`[dbscout] Connection error (${profile.host}/${profile.database}): ${errorMessage(error)}`);
  });

  return {
    async connect() {
      await client.connect();
    },
    async query(text, params) {
      // A multi-statement string yields one result per statement; keep the last
      const raw: pg.QueryResult | pg.QueryResult[] = await client.query(text, params);
      const result = Array.isArray(raw) ? raw[raw.length - 1] : raw;
      return { rows: result?.rows ?? [] };
    },
    async end() {
      await client.end();
    },
  };
};

// ============================================================================
// RESOLVER
// ============================================================================

export interface ConnectionResolverOptions {
  clientFactory?: ClientFactory;
  connectTimeoutMs?: number;
}

export class ConnectionResolver {
  private readonly clientFactory: ClientFactory;
  private readonly connectTimeoutMs: number;

  constructor(
    readonly registry: ConnectionRegistry,
    options: ConnectionResolverOptions = {}
  ) {
    this.clientFactory = options.clientFactory ?? createPgClient;
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
  }

  /**
   * Look up a profile. Throws unknown_database without touching the network.
   */
  resolve(database: string): ConnectionProfile {
    const profile = this.registry.get(database);
    if (!profile) {
      throw new DbToolError("unknown_database", `Database "${database}" is not configured`, {
        database,
      });
    }
    return profile;
  }

  /**
   * Open a fresh connection, hand it to `fn`, and close it afterwards
   * whatever happens. Errors thrown by `fn` propagate unchanged.
   */
  async withConnection<T>(database: string, fn: (client: DbClient) => Promise<T>): Promise<T> {
    const profile = this.resolve(database);
    const client = this.clientFactory(profile, { connectTimeoutMs: this.connectTimeoutMs });

    try {
      await withTimeout(
        client.connect(),
        this.connectTimeoutMs,
        `Connection timed out after ${this.connectTimeoutMs}ms`
      );
    } catch (error) {
      await this.release(client, database);
      throw new DbToolError(
        "connection_failure",
        `Failed to connect to database "${database}": ${errorMessage(error)}`,
        { database, cause: error }
      );
    }

    try {
      return await fn(client);
    } finally {
      await this.release(client, database);
    }
  }

  private async release(client: DbClient, database: string): Promise<void> {
    try {
      await withTimeout(client.end(), RELEASE_TIMEOUT_MS, "Close timed out");
    } catch (error) {
      console.error(`[dbscout] Failed to close connection to ${database}: ${errorMessage(error)}`);
    }
  }
}
