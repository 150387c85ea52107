/**
 * Configuration loader and validator
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { ConfigurationError, envKey } from "../lib/index.js";
import type { ClientOptions } from "../lib/index.js";

export interface CliFlags {
  config?: string;
  account?: string;
  url?: string;
  username?: string;
  password?: string;
  passwordHash?: string;
  timeout?: string;
  insecure?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
}

export interface CliConfig {
  account: string;
  url: string | undefined;
  username: string;
  password: string | undefined;
  passwordHash: string | undefined;
  timeout: number;
  rejectUnauthorized: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment, file, and CLI flags
 */
export function loadConfig(flags: CliFlags = {}, env: Env = process.env): CliConfig {
  if (flags.config) {
    loadEnvFile(flags.config, env);
  }

  const account = flags.account || env.OPENPROVIDER_ACCOUNT || "";
  const optional = (field: string): string | undefined =>
    env[envKey(field, account)] || undefined;

  // Flags win over the environment; a hash wins over a password from the same source.
  const passwordHash = flags.passwordHash || (flags.password ? undefined : optional("password_hash"));
  const password = passwordHash ? undefined : flags.password || optional("password");

  return {
    account,
    url: flags.url || env.OPENPROVIDER_URL || undefined,
    username: flags.username || optional("username") || "",
    password,
    passwordHash,
    timeout: parseInt(flags.timeout || env.OPENPROVIDER_TIMEOUT || "60000", 10),
    rejectUnauthorized: flags.insecure
      ? false
      : parseBool(env.OPENPROVIDER_REJECT_UNAUTHORIZED, true),
  };
}

/**
 * Validate that required configuration is present
 */
export function validateRequiredEnv(config: CliConfig): Error | null {
  const missing: string[] = [];

  if (!config.username) {
    missing.push("username");
  }
  if (!config.password && !config.passwordHash) {
    missing.push("password");
  }

  if (missing.length > 0) {
    const account = config.account ? ` for account ${config.account}` : "";
    return new ConfigurationError(
      `Missing openprovider ${missing.join(", ")}${account}.\n` +
        `Set via environment variables (${envKey("username", config.account)}, ` +
        `${envKey("password", config.account)} or ${envKey("password_hash", config.account)}) or CLI flags.`
    );
  }

  if (!Number.isInteger(config.timeout) || config.timeout < 0) {
    return new ConfigurationError("The timeout must be a non-negative integer.");
  }

  return null;
}

export function toClientOptions(config: CliConfig): ClientOptions {
  return {
    username: config.username,
    password: config.password,
    passwordHash: config.passwordHash,
    url: config.url,
    timeout: config.timeout,
    rejectUnauthorized: config.rejectUnauthorized,
  };
}

/**
 * Load environment variables from a file
 */
function loadEnvFile(filepath: string, env: Env): void {
  let content: string;

  try {
    content = readFileSync(resolve(filepath), "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to load config file ${filepath}: ${message}`, {
      cause: error,
    });
  }

  for (const line of content.split("\n")) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const match = trimmed.match(/^([A-Z_][A-Z0-9_]*)\s*=\s*(.*)$/);
    if (match) {
      const [, key = "", value = ""] = match;
      env[key] = value.replace(/^["']|["']$/g, "");
    }
  }
}

/**
 * Parse a boolean value from string
 */
function parseBool(
  value: string | undefined | null,
  defaultValue: boolean = false
): boolean {
  if (value === undefined || value === null || value === "") {
    return defaultValue;
  }

  const str = String(value).toLowerCase();
  return str === "true" || str === "1" || str === "yes";
}

export interface ConfigSummary {
  account: string;
  url: string;
  username: string;
  password: string;
  passwordHash: string;
  timeout: number;
  rejectUnauthorized: boolean;
}

/**
 * Get configuration summary (safe for logging)
 */
export function getConfigSummary(config: CliConfig): ConfigSummary {
  return {
    account: config.account || "(default)",
    url: config.url || "(default)",
    username: config.username || "(not set)",
    password: config.password ? "***" : "(not set)",
    passwordHash: config.passwordHash ? "***" : "(not set)",
    timeout: config.timeout,
    rejectUnauthorized: config.rejectUnauthorized,
  };
}
