// pattern: Imperative Shell

import type { ModelConfig } from "../config/schema.js";
import type { ModelProvider } from "./types.js";
import { createOpenAICompatAdapter, type ChatCompletionClient } from "./openai-compat.js";

/**
 * Build the search model provider named in config. `client` replaces the SDK
 * client and is only passed by tests.
 */
export function createModelProvider(config: ModelConfig, client?: ChatCompletionClient): ModelProvider {
  switch (config.provider) {
    case "openai-compat":
      return createOpenAICompatAdapter(config, client);
    default:
      throw new Error(`model provider ${String(config.provider)} has no web search support; use 'openai-compat'`);
  }
}
