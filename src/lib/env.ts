import { OpenProviderClient } from "./client.js";
import { ConfigurationError } from "./errors.js";
import type { ClientOptions } from "./types.js";

export const ENV_PREFIX = "OPENPROVIDER";

type Env = Record<string, string | undefined>;

/** `OPENPROVIDER_USERNAME`, or `OPENPROVIDER_RESELLER_USERNAME` for account "reseller". */
export function envKey(field: string, account: string = ""): string {
  const accountPart = account ? `${account.toUpperCase()}_` : "";
  return `${ENV_PREFIX}_${accountPart}${field.toUpperCase()}`;
}

export function readEnv(
  field: string,
  account: string = "",
  env: Env = process.env
): string {
  const value = env[envKey(field, account)];

  if (value === undefined || value === "") {
    let message = `Missing openprovider ${field}`;
    if (account) {
      message += ` for account ${account}`;
    }
    throw new ConfigurationError(message);
  }

  return value;
}

/**
 * Builds a client from `OPENPROVIDER_*` variables. A password hash is
 * preferred over a plain password when both are set.
 */
export function createClientFromEnv(
  account: string = "",
  env: Env = process.env,
  options: Omit<ClientOptions, "username" | "password" | "passwordHash"> = {}
): OpenProviderClient {
  const username = readEnv("username", account, env);
  const passwordHash = env[envKey("password_hash", account)] || undefined;
  const password = passwordHash ? undefined : readEnv("password", account, env);
  const url = options.url ?? (env[`${ENV_PREFIX}_URL`] || undefined);

  return new OpenProviderClient({
    ...options,
    username,
    password,
    passwordHash,
    url,
  });
}
