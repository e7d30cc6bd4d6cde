// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { AppConfigSchema } from "./schema.js";

describe("AppConfigSchema", () => {
  it("should fill every default from an empty document", () => {
    const result = AppConfigSchema.parse({});

    expect(result.model.provider).toBe("openai-compat");
    expect(result.model.name).toBe("gpt-4o-search-preview");
    expect(result.model.api_key).toBeUndefined();
    expect(result.model.timeout_ms).toBe(120000);
    expect(result.search.market).toBe("Lithuanian market");
    expect(result.search.temperature).toBe(0.2);
    expect(result.search.location).toEqual({ country: "LT", city: "Vilnius" });
  });

  it("should keep explicit values", () => {
    const result = AppConfigSchema.parse({
      model: { name: "gpt-4o-mini-search-preview", api_key: "test-secret", base_url: "http://localhost:8080/v1" },
      search: { market: "Latvian market", temperature: 0, location: { country: "LV", city: "Riga" } },
    });

    expect(result.model.name).toBe("gpt-4o-mini-search-preview");
    expect(result.model.api_key).toBe("test-secret");
    expect(result.model.base_url).toBe("http://localhost:8080/v1");
    expect(result.search.market).toBe("Latvian market");
    expect(result.search.temperature).toBe(0);
    expect(result.search.location).toEqual({ country: "LV", city: "Riga" });
  });

  it("should reject an unknown provider", () => {
    expect(() => AppConfigSchema.parse({ model: { provider: "anthropic" } })).toThrow();
  });

  it("should reject a country that is not a two-letter code", () => {
    expect(() => AppConfigSchema.parse({ search: { location: { country: "Lithuania" } } })).toThrow();
  });

  it("should reject a temperature outside the sampling range", () => {
    expect(() => AppConfigSchema.parse({ search: { temperature: 3 } })).toThrow();
  });
});
