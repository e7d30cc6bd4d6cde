// pattern: Functional Core

/**
 * Shared types for model providers.
 * These types define the port interface that all model adapters normalize to.
 */

export type TextBlock = {
  type: "text";
  text: string;
};

export type Message = {
  role: "user";
  content: string;
};

/**
 * Approximate location used to bias the provider's web search results.
 */
export type LocationBias = {
  readonly type: "approximate";
  readonly country: string;
  readonly city: string;
};

export type ModelRequest = {
  messages: ReadonlyArray<Message>;
  model: string;
  temperature?: number;
  location?: LocationBias;
};

export type StopReason = "end_turn" | "max_tokens" | "content_filter" | "stop_sequence";

export type UsageStats = {
  input_tokens: number;
  output_tokens: number;
};

export type ModelResponse = {
  content: Array<TextBlock>;
  stop_reason: StopReason;
  usage: UsageStats;
};

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "api_error";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    public retryable: boolean = false,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export interface ModelProvider {
  complete(request: ModelRequest): Promise<ModelResponse>;
}

export function responseText(response: ModelResponse): string {
  return response.content.map((block) => block.text).join("\n");
}
