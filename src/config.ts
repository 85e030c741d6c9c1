/**
 * dbscout configuration
 *
 * A JSON file maps logical database names to explicit connection fields:
 *
 *   { "databases": { "analytics": { "host": "db1", "port": 5432, "user": "reader", "password": "..." } } }
 *
 * `port` defaults to 5432 and `database` to the logical name.
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { homedir } from "os";
import { z } from "zod";
import { ConfigLoadError, errorMessage } from "./errors.js";
import type { ConnectionProfile } from "./types.js";

export const CONFIG_ENV_VAR = "DBSCOUT_CONFIG";
export const DEFAULT_PORT = 5432;

const DatabaseEntrySchema = z
  .object({
    host: z.string().min(1, "host is required"),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
    user: z.string().min(1, "user is required"),
    password: z.string(),
    database: z.string().min(1).optional(),
    ssl: z.boolean().optional(),
  })
  .strict();

const ConfigFileSchema = z.object({
  databases: z.record(z.string().min(1), DatabaseEntrySchema),
});

export interface Config {
  /** File the registry was read from */
  path: string;
  databases: Record<string, ConnectionProfile>;
}

export interface LoadConfigOptions {
  /** Explicit path, e.g. from --config; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

/**
 * Candidate locations, highest priority first.
 */
export function configSearchPaths(options: LoadConfigOptions = {}): string[] {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configHome = env.XDG_CONFIG_HOME
    ? env.XDG_CONFIG_HOME
    : join(options.home ?? homedir(), ".config");

  return [
    join(cwd, "dbscout.json"),
    join(cwd, ".dbscout.json"),
    join(configHome, "dbscout", "config.json"),
  ];
}

export function findConfigPath(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  const explicit = options.configPath ?? env[CONFIG_ENV_VAR];

  if (explicit) {
    const path = resolve(options.cwd ?? process.cwd(), explicit);
    if (!existsSync(path)) {
      throw new ConfigLoadError(`Config file not found: ${path}`, { path });
    }
    return path;
  }

  const candidates = configSearchPaths(options);
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new ConfigLoadError(
      `No config file found. Looked in: ${candidates.join(", ")} (or set ${CONFIG_ENV_VAR})`
    );
  }
  return found;
}

/**
 * Validate a parsed config document and build the profile table.
 */
export function parseConfig(raw: unknown, path: string): Config {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigLoadError(`Invalid config ${path}: ${issues}`, { path });
  }

  const databases: Record<string, ConnectionProfile> = {};
  for (const [name, entry] of Object.entries(parsed.data.databases)) {
    const profile: ConnectionProfile = {
      host: entry.host,
      port: entry.port,
      database: entry.database ?? name,
      user: entry.user,
      password: entry.password,
      ...(entry.ssl === undefined ? {} : { ssl: entry.ssl }),
    };
    databases[name] = Object.freeze(profile);
  }

  return { path, databases };
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const path = findConfigPath(options);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigLoadError(`Failed to parse ${path}: ${errorMessage(error)}`, {
      path,
      cause: error,
    });
  }

  const config = parseConfig(raw, path);
  console.error(
    `[dbscout] Loaded ${Object.keys(config.databases).length} database(s) from ${path}`
  );
  return config;
}
