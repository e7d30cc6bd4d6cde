// pattern: Functional Core

/**
 * Recovers product records from free-form model output.
 *
 * Models wrap the requested array in prose, code fences or a `{"products": [...]}`
 * envelope. The first embedded array-of-objects or products envelope is parsed
 * when present, the whole text otherwise. Records are validated one at a time;
 * those that fail are skipped and counted.
 */

import { z } from "zod";
import { PRICED_OBJECTIVES, type PricedObjective, type Product } from "./types.js";

export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

export type ExtractionReport = {
  readonly products: ReadonlyArray<Product>;
  readonly skipped: number;
};

const EMBEDDED_JSON_PATTERN = /(\[\s*\{[\s\S]*\}\s*\]|\{\s*"products"\s*:\s*\[[\s\S]*\]\s*\})/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// One amount: digit groups of three behind space, dot or comma, then an
// optional fraction; or a plain run of digits with an optional fraction.
const AMOUNT_PATTERN = /-?\d{1,3}(?:[\s.,]\d{3})+(?:[.,]\d+)?|-?\d+(?:[.,]\d+)?/g;

function normalizeAmount(token: string): number {
  const compact = token.replace(/\s/g, "");
  const lastComma = compact.lastIndexOf(",");
  const lastDot = compact.lastIndexOf(".");

  if (lastComma >= 0 && lastDot >= 0) {
    // Whichever separator comes last is the decimal one.
    const decimal = lastComma > lastDot ? "," : ".";
    const grouping = decimal === "," ? /\./g : /,/g;
    return Number(compact.replace(grouping, "").replace(decimal, "."));
  }

  const separator = lastComma >= 0 ? "," : lastDot >= 0 ? "." : null;
  if (separator === null) {
    return Number(compact);
  }

  const parts = compact.split(separator);
  const [whole = "", fraction = ""] = parts;
  if (parts.length > 2) {
    return Number(parts.join(""));
  }
  // "1,299" is a thousand; "0.125" and "1234.567" are fractions.
  if (fraction.length === 3 && /^-?[1-9]\d{0,2}$/.test(whole)) {
    return Number(`${whole}${fraction}`);
  }
  return Number(`${whole}.${fraction}`);
}

/**
 * Parse "1,99 €", "EUR 1 299.00" and similar into a number. Strings holding
 * more than one amount ("2 x 1,99 €", "from 3 to 5 EUR") have no single price.
 */
export function parsePriceValue(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }

  const amounts = value.match(AMOUNT_PATTERN);
  if (!amounts || amounts.length !== 1) {
    return null;
  }

  const [amount = ""] = amounts;
  const parsed = normalizeAmount(amount);
  return Number.isFinite(parsed) ? parsed : null;
}

function stringifyProperty(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => stringifyProperty(item) ?? "").join(", ");
  }
  return JSON.stringify(value);
}

const textSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value)));

// Blank means absent for the optional identifiers.
const optionalTextSchema = textSchema.transform((value) => {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
});

const priceSchema = z.unknown().transform((value, ctx) => {
  const price = parsePriceValue(value);
  if (price === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a numeric price" });
    return z.NEVER;
  }
  return price;
});

const propertiesSchema = z.unknown().transform((value): Record<string, string> => {
  if (!isRecord(value)) {
    return {};
  }
  const entries: Array<[string, string]> = [];
  for (const [key, raw] of Object.entries(value)) {
    const text = stringifyProperty(raw);
    if (text !== null) {
      entries.push([key, text]);
    }
  }
  // fromEntries defines keys such as "__proto__" as own properties.
  return Object.fromEntries(entries);
});

const ProductRecordSchema = z.object({
  provider: textSchema,
  providerWebsite: textSchema,
  providerUrl: optionalTextSchema,
  productName: textSchema,
  productProperties: propertiesSchema,
  productSku: optionalTextSchema,
  productPrice: priceSchema,
  unitType: optionalTextSchema,
  evaluation: textSchema,
});

type ProductRecordField = keyof z.input<typeof ProductRecordSchema>;

// The prompt asks for camelCase; snake_case is what models fall back to.
const FIELD_ALIASES: Readonly<Record<ProductRecordField, ReadonlyArray<string>>> = {
  provider: ["provider"],
  providerWebsite: ["providerWebsite", "provider_website"],
  providerUrl: ["providerUrl", "provider_url"],
  productName: ["productName", "product_name"],
  productProperties: ["productProperties", "product_properties"],
  productSku: ["productSku", "product_sku"],
  productPrice: ["productPrice", "product_price"],
  unitType: ["unitType", "unit_type"],
  evaluation: ["evaluation"],
};

function pickAliases(record: Record<string, unknown>): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const [field, aliases] of Object.entries(FIELD_ALIASES)) {
    const key = aliases.find((alias) => record[alias] !== undefined);
    picked[field] = key === undefined ? undefined : record[key];
  }
  return picked;
}

function pickObjectivePrices(record: Record<string, unknown>): Partial<Record<PricedObjective, number>> {
  const prices: Partial<Record<PricedObjective, number>> = {};
  for (const objective of PRICED_OBJECTIVES) {
    const price = parsePriceValue(record[`price_per_${objective}`]);
    if (price !== null) {
      prices[objective] = price;
    }
  }
  return prices;
}

export function toProduct(value: unknown): Product | null {
  if (!isRecord(value)) {
    return null;
  }

  const result = ProductRecordSchema.safeParse(pickAliases(value));
  if (!result.success) {
    return null;
  }

  const { providerUrl, productSku, unitType, ...required } = result.data;
  const product: Product = {
    ...required,
    ...(providerUrl !== undefined ? { providerUrl } : {}),
    ...(productSku !== undefined ? { productSku } : {}),
    ...(unitType !== undefined ? { unitType } : {}),
    pricesPerObjective: pickObjectivePrices(value),
  };
  return Object.freeze(product);
}

/**
 * Parse the first embedded product array or products envelope, or the whole
 * text when neither shape is present.
 */
export function parseModelJson(rawText: string): unknown {
  const match = EMBEDDED_JSON_PATTERN.exec(rawText);
  const candidate = match?.[0] ?? rawText;

  try {
    return JSON.parse(candidate);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(reason, { cause: error });
  }
}

/**
 * The list of product-like records in a parsed reply. Shapes other than an
 * array or a products envelope hold no products; that is not an error.
 */
export function productRecords(parsed: unknown): ReadonlyArray<unknown> {
  if (isRecord(parsed) && "products" in parsed) {
    const products = parsed["products"];
    return Array.isArray(products) ? products : [];
  }
  if (Array.isArray(parsed)) {
    return parsed;
  }
  return [];
}

export function extractProductsWithReport(rawText: string): ExtractionReport {
  const records = productRecords(parseModelJson(rawText));
  const products: Array<Product> = [];

  for (const record of records) {
    const product = toProduct(record);
    if (product) {
      products.push(product);
    }
  }

  return { products, skipped: records.length - products.length };
}

export function extractProducts(rawText: string): ReadonlyArray<Product> {
  return extractProductsWithReport(rawText).products;
}
