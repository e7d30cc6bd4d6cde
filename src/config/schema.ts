// pattern: Functional Core
import { z } from "zod";

const ModelConfigSchema = z.object({
  provider: z.enum(["openai-compat"]).default("openai-compat"),
  name: z.string().min(1).default("gpt-4o-search-preview"),
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
  timeout_ms: z.number().int().positive().default(120000),
});

const LocationConfigSchema = z.object({
  country: z.string().length(2).default("LT"),
  city: z.string().min(1).default("Vilnius"),
});

const SearchConfigSchema = z.object({
  market: z.string().min(1).default("Lithuanian market"),
  temperature: z.number().min(0).max(2).default(0.2),
  location: LocationConfigSchema.default({}),
});

const AppConfigSchema = z.object({
  model: ModelConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type LocationConfig = z.infer<typeof LocationConfigSchema>;

export { AppConfigSchema, ModelConfigSchema, SearchConfigSchema, LocationConfigSchema };
