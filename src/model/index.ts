// pattern: Functional Core

export type {
  TextBlock,
  Message,
  LocationBias,
  ModelRequest,
  StopReason,
  UsageStats,
  ModelResponse,
  ModelErrorCode,
} from "./types.js";

export { ModelError, responseText, type ModelProvider } from "./types.js";
export { createOpenAICompatAdapter, type ChatCompletionClient } from "./openai-compat.js";
export { createModelProvider } from "./factory.js";
