// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, MISSING_CREDENTIAL_HELP, loadConfig } from "./config.js";

const ENV_KEYS = ["OPENAI_API_KEY", "OPENAI_BASE_URL", "MARKET_SCOUT_CONFIG"] as const;

const getTempConfigPath = () =>
  join(tmpdir(), `test-config-${Date.now()}-${Math.random().toString(36).slice(2)}.toml`);

describe("loadConfig", () => {
  let tempPath: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    tempPath = getTempConfigPath();
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    try {
      unlinkSync(tempPath);
    } catch {
      // file might not exist
    }
  });

  it("should read the credential and search settings from TOML", () => {
    writeFileSync(
      tempPath,
      `
[model]
api_key = "test-secret"

[search]
market = "Estonian market"

[search.location]
country = "EE"
city = "Tallinn"
`
    );

    const config = loadConfig(tempPath);

    expect(config.model.api_key).toBe("test-secret");
    expect(config.model.name).toBe("gpt-4o-search-preview");
    expect(config.search.market).toBe("Estonian market");
    expect(config.search.location).toEqual({ country: "EE", city: "Tallinn" });
  });

  it("should let OPENAI_API_KEY override the TOML value", () => {
    writeFileSync(tempPath, `[model]\napi_key = "toml-secret"\n`);
    process.env["OPENAI_API_KEY"] = "env-secret";

    const config = loadConfig(tempPath);

    expect(config.model.api_key).toBe("env-secret");
  });

  it("should apply OPENAI_BASE_URL", () => {
    writeFileSync(tempPath, `[model]\napi_key = "test-secret"\n`);
    process.env["OPENAI_BASE_URL"] = "http://localhost:11434/v1";

    const config = loadConfig(tempPath);

    expect(config.model.base_url).toBe("http://localhost:11434/v1");
  });

  it("should read the path named by MARKET_SCOUT_CONFIG", () => {
    writeFileSync(tempPath, `[model]\napi_key = "test-secret"\nname = "custom-search-model"\n`);
    process.env["MARKET_SCOUT_CONFIG"] = tempPath;

    const config = loadConfig();

    expect(config.model.name).toBe("custom-search-model");
  });

  it("should fail with missing_credential and instructions when no key is configured", () => {
    writeFileSync(tempPath, `[search]\nmarket = "Lithuanian market"\n`);

    let caught: unknown;
    try {
      loadConfig(tempPath);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "missing_credential", message: MISSING_CREDENTIAL_HELP });
  });

  it("should treat a blank key as missing", () => {
    writeFileSync(tempPath, `[model]\napi_key = "   "\n`);

    expect(() => loadConfig(tempPath)).toThrow(MISSING_CREDENTIAL_HELP);
  });

  it("should fail with invalid_config when an explicit file does not exist", () => {
    expect(() => loadConfig(tempPath)).toThrow(`config file not found: ${tempPath}`);
  });

  it("should fail with invalid_config on malformed TOML", () => {
    writeFileSync(tempPath, `[model\napi_key = `);

    expect(() => loadConfig(tempPath)).toThrow(ConfigError);
  });

  it("should name the offending field when validation fails", () => {
    writeFileSync(tempPath, `[model]\napi_key = "test-secret"\ntimeout_ms = -5\n`);

    expect(() => loadConfig(tempPath)).toThrow(/model\.timeout_ms/);
  });
});
