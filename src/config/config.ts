// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export type ConfigErrorCode = "missing_credential" | "invalid_config";

export class ConfigError extends Error {
  constructor(
    public code: ConfigErrorCode,
    message: string = ""
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_CONFIG_PATH = "config.toml";

export const MISSING_CREDENTIAL_HELP = `OpenAI API key not found.

1. Create a config.toml file next to where you run market-scout:

   [model]
   api_key = "your_openai_api_key"

   or export OPENAI_API_KEY in your shell.

2. Restart market-scout.`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readToml(path: string, required: boolean): Record<string, unknown> {
  if (!existsSync(path)) {
    if (required) {
      throw new ConfigError("invalid_config", `config file not found: ${path}`);
    }
    return {};
  }

  try {
    return TOML.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError("invalid_config", `could not parse ${path}: ${reason}`);
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Load config.toml (or the file named by MARKET_SCOUT_CONFIG) and apply
 * environment overrides. A missing default file is not an error; a missing
 * credential is, since nothing can be searched without it.
 */
export function loadConfig(configPath?: string): AppConfig {
  const explicitPath = configPath ?? process.env["MARKET_SCOUT_CONFIG"];
  const resolvedPath = resolve(explicitPath ?? DEFAULT_CONFIG_PATH);
  const parsed = readToml(resolvedPath, explicitPath !== undefined);

  // Environment variable overrides for secrets
  const modelObj: Record<string, unknown> = isRecord(parsed["model"]) ? { ...parsed["model"] } : {};
  if (process.env["OPENAI_API_KEY"]) {
    modelObj["api_key"] = process.env["OPENAI_API_KEY"];
  }
  if (process.env["OPENAI_BASE_URL"]) {
    modelObj["base_url"] = process.env["OPENAI_BASE_URL"];
  }

  let config: AppConfig;
  try {
    config = AppConfigSchema.parse({ ...parsed, model: modelObj });
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError("invalid_config", `invalid configuration in ${resolvedPath}: ${formatIssues(error)}`);
    }
    throw error;
  }

  if (!config.model.api_key || config.model.api_key.trim().length === 0) {
    throw new ConfigError("missing_credential", MISSING_CREDENTIAL_HELP);
  }

  return config;
}
