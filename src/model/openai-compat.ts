// pattern: Imperative Shell

import OpenAI from "openai";
import type { ModelConfig } from "../config/schema.js";
import type {
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
  TextBlock,
  UsageStats,
} from "./types.js";
import { ModelError } from "./types.js";

/**
 * The slice of the OpenAI client this adapter calls. Tests pass a fake.
 */
export type ChatCompletionClient = {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
};

function normalizeStopReason(finishReason: string | null): StopReason {
  if (finishReason === "length") {
    return "max_tokens";
  }
  if (finishReason === "stop") {
    return "end_turn";
  }
  if (finishReason === "content_filter") {
    return "content_filter";
  }
  return "stop_sequence";
}

function normalizeUsage(usage: OpenAI.Completions.CompletionUsage | undefined): UsageStats {
  return {
    input_tokens: usage?.prompt_tokens ?? 0,
    output_tokens: usage?.completion_tokens ?? 0,
  };
}

export function normalizeMessage(msg: Message): OpenAI.Chat.ChatCompletionUserMessageParam {
  return { role: msg.role, content: msg.content };
}

export function buildCompletionParams(
  request: ModelRequest
): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
  const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model: request.model,
    messages: request.messages.map(normalizeMessage),
    temperature: request.temperature,
  };

  if (request.location) {
    params.web_search_options = {
      user_location: {
        type: request.location.type,
        approximate: {
          country: request.location.country,
          city: request.location.city,
        },
      },
    };
  }

  return params;
}

function toModelError(error: unknown): unknown {
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

export function createOpenAICompatAdapter(
  config: ModelConfig,
  client?: ChatCompletionClient
): ModelProvider {
  const apiKey = config.api_key || process.env["OPENAI_API_KEY"];

  if (!client && !apiKey) {
    throw new Error(
      "OpenAI-compatible adapter requires api_key in config or OPENAI_API_KEY environment variable"
    );
  }

  // The SDK retries twice by default; searches are issued exactly once.
  const completions: ChatCompletionClient =
    client ??
    new OpenAI({
      apiKey,
      baseURL: config.base_url,
      timeout: config.timeout_ms,
      maxRetries: 0,
    });

  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      let response: OpenAI.Chat.ChatCompletion;
      try {
        response = await completions.chat.completions.create(buildCompletionParams(request));
      } catch (error) {
        throw toModelError(error);
      }

      const choice = response.choices?.[0];
      if (!choice) {
        throw new ModelError("api_error", false, "no choices in response");
      }

      const content: Array<TextBlock> = [];
      if (choice.message.content) {
        content.push({ type: "text", text: choice.message.content });
      }

      return {
        content,
        stop_reason: normalizeStopReason(choice.finish_reason),
        usage: normalizeUsage(response.usage),
      };
    },
  };
}
