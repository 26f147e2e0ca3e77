import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "@docent/core";
import { loadConfig, parseConfig, resolveConfigPath } from "../load";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "docent-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("reads and validates a YAML file", async () => {
    const path = join(dir, "config.yaml");
    await writeFile(
      path,
      [
        'api_url: "http://localhost:9000/v1/"',
        'api_key: "test-key"',
        'telegram_bot_token: "test-token"',
        'files_path: "./docs"',
        "tools:",
        "  - file_search",
        "max_context_messages: 6",
      ].join("\n"),
    );

    const result = await loadConfig(path, {});

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.apiUrl).toBe("http://localhost:9000/v1/");
      expect(result.value.filesPath).toBe("./docs");
      expect(result.value.maxContextMessages).toBe(6);
    }
  });

  test("returns ConfigError for a missing file", async () => {
    const result = await loadConfig(join(dir, "missing.yaml"), {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toContain("Failed to read config file");
    }
  });

  test("returns ConfigError for invalid YAML", async () => {
    const path = join(dir, "broken.yaml");
    await writeFile(path, "api_key: [unclosed\n");

    const result = await loadConfig(path, {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain("Failed to parse config file");
    }
  });

  test("lists missing keys for an empty file", async () => {
    const path = join(dir, "empty.yaml");
    await writeFile(path, "");

    const result = await loadConfig(path, {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain("api_key");
      expect(result.error.message).toContain("telegram_bot_token");
    }
  });
});

describe("parseConfig", () => {
  test("lets environment variables override secrets and log level", () => {
    const result = parseConfig(
      { api_key: "file-key", telegram_bot_token: "file-token" },
      { DOCENT_API_KEY: "env-key", LOG_LEVEL: "debug" },
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.apiKey).toBe("env-key");
      expect(result.value.telegramBotToken).toBe("file-token");
      expect(result.value.logLevel).toBe("debug");
    }
  });

  test("rejects an unknown log level", () => {
    const result = parseConfig({ api_key: "k", telegram_bot_token: "t" }, { LOG_LEVEL: "loud" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Invalid log level: loud (must be one of: debug, info, warn, error)",
      );
    }
  });

  test("rejects a top-level list", () => {
    const result = parseConfig(["api_key"]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Config must be a YAML mapping");
    }
  });
});

describe("resolveConfigPath", () => {
  test("prefers --config over the environment", () => {
    expect(resolveConfigPath(["node", "main", "--config", "/etc/docent.yaml"], { DOCENT_CONFIG: "x.yaml" })).toBe(
      "/etc/docent.yaml",
    );
  });

  test("falls back to DOCENT_CONFIG, then config.yaml", () => {
    expect(resolveConfigPath([], { DOCENT_CONFIG: "x.yaml" })).toBe("x.yaml");
    expect(resolveConfigPath([], {})).toBe("config.yaml");
  });
});
