import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import { ConfigError, err, isLogLevel, ok, type Result } from "@docent/core";
import { DEFAULT_CONFIG_PATH } from "./constants";
import { DocentConfigSchema } from "./schema";
import type { DocentConfig } from "./types";

type Env = Readonly<Record<string, string | undefined>>;

/** Environment variables that take precedence over the file. */
const ENV_OVERRIDES: ReadonlyArray<readonly [envKey: string, fileKey: string]> = [
  ["DOCENT_API_KEY", "api_key"],
  ["DOCENT_TELEGRAM_BOT_TOKEN", "telegram_bot_token"],
  ["LOG_LEVEL", "log_level"],
];

/**
 * Pick the config file path: `--config <path>` wins, then `DOCENT_CONFIG`,
 * then config.yaml in the working directory.
 */
export function resolveConfigPath(argv: readonly string[], env: Env = process.env): string {
  const flag = argv.indexOf("--config");
  if (flag !== -1 && argv[flag + 1]) {
    return argv[flag + 1];
  }
  return env.DOCENT_CONFIG || DEFAULT_CONFIG_PATH;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate already-parsed config contents. Returns Result — never throws.
 */
export function parseConfig(raw: unknown, env: Env = {}): Result<DocentConfig, ConfigError> {
  // An empty file parses to null
  const contents = raw ?? {};
  if (!isRecord(contents)) {
    return err(new ConfigError("Config must be a YAML mapping"));
  }

  const merged: Record<string, unknown> = { ...contents };
  for (const [envKey, fileKey] of ENV_OVERRIDES) {
    const value = env[envKey];
    if (value) merged[fileKey] = value;
  }

  const level = merged.log_level;
  if (typeof level === "string" && !isLogLevel(level)) {
    return err(new ConfigError(`Invalid log level: ${level} (must be one of: debug, info, warn, error)`));
  }

  const parsed = DocentConfigSchema.safeParse(merged);
  if (!parsed.success) {
    return err(new ConfigError(`Invalid configuration: ${formatIssues(parsed.error.issues)}`, parsed.error));
  }
  return ok(parsed.data);
}

/**
 * Read and validate the YAML config file. Returns Result — never throws.
 */
export async function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  env: Env = process.env,
): Promise<Result<DocentConfig, ConfigError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (cause) {
    return err(new ConfigError(`Failed to read config file ${path}`, cause));
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (cause) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return err(new ConfigError(`Failed to parse config file ${path}: ${detail}`, cause));
  }

  return parseConfig(raw, env);
}
