// pattern: Functional Core

/**
 * Prompt assembly for product searches.
 * The prompt is a fixed, ordered list of fragments; each fragment carries a
 * predicate on the request and is skipped when the predicate fails.
 */

import type { LocationBias, ModelRequest } from "../model/types.js";
import { customUnitLabel, type PricedObjective, type SearchRequest } from "./types.js";

export const DEFAULT_MARKET = "Lithuanian market";

export type PromptOptions = {
  readonly market: string;
};

export type SearchModelSettings = PromptOptions & {
  readonly model: string;
  readonly temperature: number;
  readonly location: LocationBias;
};

type PromptFragment = {
  readonly name: string;
  readonly when: (request: SearchRequest) => boolean;
  readonly render: (request: SearchRequest, options: PromptOptions) => string;
};

const always = (): boolean => true;

const hasObjective = (request: SearchRequest): boolean => request.priceCalcObjective !== "none";

const OBJECTIVE_BASIS: Readonly<Record<Exclude<PricedObjective, "unit">, string>> = {
  kg: "kilogram",
  liter: "liter",
  package: "package",
};

export function calculationBasis(request: SearchRequest): string | null {
  const objective = request.priceCalcObjective;
  if (objective === "none") {
    return null;
  }
  if (objective === "unit") {
    return customUnitLabel(request) ?? "unit";
  }
  return OBJECTIVE_BASIS[objective];
}

/**
 * Field lines of the one-element JSON example shown to the model.
 */
export function schemaFields(request: SearchRequest): Array<string> {
  const fields = [
    `"provider": "Company selling the product"`,
    `"providerWebsite": "Main website domain (e.g., telia.lt)"`,
    `"providerUrl": "Full URL to the specific product page"`,
    `"productName": "Complete product name with model"`,
    `"productProperties": {\n      "key_spec1": "value1",\n      "key_spec2": "value2"\n    }`,
    `"productSku": "Any product identifiers (SKU, UPC, model number)"`,
    `"productPrice": 299.99`,
  ];

  if (request.priceCalcObjective !== "none") {
    fields.push(`"price_per_${request.priceCalcObjective}": 9.99`);
  }

  const unitLabel = customUnitLabel(request);
  if (unitLabel) {
    fields.push(`"unitType": ${JSON.stringify(unitLabel)}`);
  }

  fields.push(`"evaluation": "Detailed assessment of how the product meets or fails each technical specification"`);
  return fields;
}

const FRAGMENTS: ReadonlyArray<PromptFragment> = [
  {
    name: "subject",
    when: always,
    render: (request, options) =>
      [
        `Analyze the ${options.market} for ${request.category} and gather detailed product information according to the following:`,
        `product name: ${request.productName}`,
        `product specification: ${request.techSpec}`,
      ].join("\n"),
  },
  {
    name: "directives",
    when: always,
    render: (_request, options) =>
      [
        `1. Find products currently sold by retailers in the ${options.market} that match the product name and specification`,
        "2. Verify the product is currently available for purchase",
        "3. Gather accurate pricing in EUR",
        "4. Evaluate technical specification requirements one by one",
      ].join("\n"),
  },
  {
    name: "price-objective",
    when: hasObjective,
    render: (request) => `5. Calculate and include price per ${calculationBasis(request) ?? "unit"} for each product`,
  },
  {
    name: "output-format",
    when: always,
    render: (request) =>
      [
        "IMPORTANT: Your response MUST be formatted EXACTLY as a valid JSON array of product objects.",
        "Each product in the array should have the following fields:",
        "",
        "[",
        "  {",
        schemaFields(request)
          .map((field) => `    ${field}`)
          .join(",\n"),
        "  }",
        "]",
      ].join("\n"),
  },
  {
    name: "output-only",
    when: always,
    render: () => "DO NOT include any explanation, preamble, or additional text - ONLY provide the JSON array.",
  },
];

export function promptFragments(request: SearchRequest): ReadonlyArray<string> {
  return FRAGMENTS.filter((fragment) => fragment.when(request)).map((fragment) => fragment.name);
}

export function buildPrompt(
  request: SearchRequest,
  options: PromptOptions = { market: DEFAULT_MARKET }
): string {
  return FRAGMENTS.filter((fragment) => fragment.when(request))
    .map((fragment) => fragment.render(request, options))
    .join("\n\n");
}

export function buildSearchRequest(request: SearchRequest, settings: SearchModelSettings): ModelRequest {
  return {
    model: settings.model,
    messages: [{ role: "user", content: buildPrompt(request, settings) }],
    temperature: settings.temperature,
    location: settings.location,
  };
}
