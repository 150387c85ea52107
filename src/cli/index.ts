import { readFile } from "node:fs/promises";
import type { AxiosInstance } from "axios";
import { Command, CommanderError } from "commander";

import {
  OpenProviderClient,
  OpenProviderError,
  VERSION,
  normalizeError,
  parseXml,
  serializeCanonical,
} from "../lib/index.js";
import type { XmlElement } from "../lib/index.js";
import {
  getConfigSummary,
  loadConfig,
  toClientOptions,
  validateRequiredEnv,
} from "./config.js";
import type { CliFlags } from "./config.js";
import { logger as defaultLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export interface RunDependencies {
  logger?: Logger;
  env?: Record<string, string | undefined>;
  http?: AxiosInstance;
}

type CommandContext = Required<Pick<RunDependencies, "logger" | "env">> & RunDependencies;

type JsonValue = string | { [key: string]: JsonValue } | JsonValue[];

// Commander exits that are not usage errors.
const CLEAN_EXITS = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

/**
 * Builds the `openprovider` program. Actions report their exit code
 * through `setExitCode`.
 */
export function createProgram(
  context: CommandContext,
  setExitCode: (code: number) => void
): Command {
  const { logger } = context;

  const program = new Command()
    .name("openprovider")
    .description("Send requests to the OpenProvider XML API")
    .version(VERSION, "-V, --version", "Show version number")
    .option("--config <file>", "Load OPENPROVIDER_* variables from an env file")
    .option("--account <name>", "Use OPENPROVIDER_<NAME>_* credentials")
    .option("--url <url>", "API endpoint")
    .option("--username <name>", "Account username")
    .option("--password <password>", "Account password")
    .option("--password-hash <hash>", "Account password hash")
    .option("--timeout <ms>", "Request timeout in milliseconds")
    .option("--insecure", "Skip TLS certificate verification")
    .option("--json", "Print reply data as JSON")
    .option("--verbose", "Log requests and responses")
    .option("--quiet", "Only log errors")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => logger.raw(text.trimEnd()),
      writeErr: (text) => logger.raw(text.trimEnd()),
      outputError: (text) => logger.error(text.trim()),
    })
    .hook("preAction", () => {
      const flags: CliFlags = program.opts();

      if (flags.verbose) {
        logger.setLevel("verbose");
      } else if (flags.quiet) {
        logger.setLevel("error");
      }
    });

  program
    .command("config")
    .description("Print the resolved configuration")
    .action(() => {
      const flags: CliFlags = program.opts();
      const config = loadConfig(flags, context.env);
      logger.raw(JSON.stringify(getConfigSummary(config), null, 2));
      setExitCode(0);
    });

  program
    .command("request")
    .description("Send the payload element and print the reply data")
    .argument("<payload>", "XML file holding the request element")
    .action(async (file: string) => {
      const flags: CliFlags = program.opts();
      setExitCode(await requestCommand(file, flags, context));
    });

  return program;
}

/** Runs the command line and resolves to the process exit code. */
export async function run(
  argv: string[],
  { logger = defaultLogger, env = process.env, http }: RunDependencies = {}
): Promise<number> {
  let exitCode = 0;
  const program = createProgram({ logger, env, http }, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return CLEAN_EXITS.has(error.code) ? 0 : 2;
    }

    if (error instanceof OpenProviderError) {
      logger.error(`${error.name}: ${error.message}`);
      return 1;
    }

    throw error;
  }
}

async function requestCommand(
  file: string,
  flags: CliFlags,
  { logger, env, http }: CommandContext
): Promise<number> {
  const config = loadConfig(flags, env);
  const configError = validateRequiredEnv(config);

  if (configError) {
    logger.error(configError.message);
    return 1;
  }

  logger.verbose("Configuration:", getConfigSummary(config));

  let source: Buffer;

  try {
    source = await readFile(file);
  } catch (error) {
    logger.error(`Cannot read payload file ${file}: ${normalizeError(error).message}`);
    return 2;
  }

  const payload = await parseXml(source);
  const client = new OpenProviderClient({
    ...toClientOptions(config),
    http,
    hooks: {
      preRequest: (_payload, envelope) => {
        logger.verbose("Request:", maskSecrets(envelope));
      },
      postRequest: (response) => {
        logger.verbose(`Response ${response.status}:`, response.data);
      },
    },
  });

  const response = await client.request(payload);
  logger.success(`Reply ${response.code}${response.description ? `: ${response.description}` : ""}`);

  const data = response.data;

  if (flags.json) {
    logger.raw(JSON.stringify(data ? toJson(data) : null, null, 2));
  } else if (data) {
    logger.raw(serializeCanonical(data));
  }

  return 0;
}

export function maskSecrets(envelope: string): string {
  return envelope
    .replace(/<password>[^<]*<\/password>/g, "<password>***</password>")
    .replace(/<hash>[^<]*<\/hash>/g, "<hash>***</hash>");
}

/**
 * Plain JSON form of an element. Leaves become strings, repeated child
 * tags become arrays and attributes are kept under `$`.
 */
export function toJson(element: XmlElement): JsonValue {
  const attributeKeys = Object.keys(element.attributes);

  if (element.children.length === 0 && attributeKeys.length === 0) {
    return element.text;
  }

  const result: { [key: string]: JsonValue } = {};

  if (attributeKeys.length > 0) {
    result.$ = { ...element.attributes };
  }

  if (element.text) {
    result._ = element.text;
  }

  for (const child of element.children) {
    const value = toJson(child);
    const existing = result[child.name];

    if (existing === undefined) {
      result[child.name] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      result[child.name] = [existing, value];
    }
  }

  return result;
}
