// pattern: Functional Core

/**
 * Domain types for product searches.
 * Requests come from user input; products are only ever produced by the extractor.
 */

export const PRICE_OBJECTIVES = ["none", "unit", "kg", "liter", "package"] as const;

export type PriceObjective = (typeof PRICE_OBJECTIVES)[number];

export type PricedObjective = Exclude<PriceObjective, "none">;

export const PRICED_OBJECTIVES: ReadonlyArray<PricedObjective> = ["unit", "kg", "liter", "package"];

export const PRICE_OBJECTIVE_LABELS: Readonly<Record<PriceObjective, string>> = {
  none: "No special calculation (standard price)",
  unit: "Price per unit (e.g., per item)",
  kg: "Price per kilogram",
  liter: "Price per liter",
  package: "Price per package",
};

export type SearchRequest = {
  readonly category: string;
  readonly productName: string;
  readonly techSpec: string;
  readonly priceCalcObjective: PriceObjective;
  readonly unitLabel?: string;
};

export type Product = {
  readonly provider: string;
  readonly providerWebsite: string;
  readonly providerUrl?: string;
  readonly productName: string;
  readonly productProperties: Readonly<Record<string, string>>;
  readonly productSku?: string;
  readonly productPrice: number;
  readonly pricesPerObjective: Readonly<Partial<Record<PricedObjective, number>>>;
  readonly unitType?: string;
  readonly evaluation: string;
};

export type SearchResult = ReadonlyArray<Product>;

export type SearchFailure = "transport" | "extraction";

export type SearchOutcome =
  | { readonly status: "found"; readonly products: SearchResult }
  | { readonly status: "empty"; readonly products: SearchResult }
  | {
      readonly status: "failed";
      readonly products: SearchResult;
      readonly failure: SearchFailure;
      readonly diagnostic: string;
    };

export type HistoryEntry = {
  readonly timestamp: string;
  readonly request: SearchRequest;
  readonly outcome: SearchOutcome;
};

export function isPriceObjective(value: string): value is PriceObjective {
  return PRICE_OBJECTIVES.some((objective) => objective === value);
}

/**
 * The custom unit label, if the request asks for per-unit pricing and supplied one.
 */
export function customUnitLabel(request: SearchRequest): string | null {
  if (request.priceCalcObjective !== "unit") {
    return null;
  }
  const label = request.unitLabel?.trim();
  return label ? label : null;
}

/**
 * Look the per-objective price up by the request's objective. The model may
 * have used a different key or omitted it, in which case there is no value.
 */
export function pricePerObjective(product: Product, objective: PriceObjective): number | undefined {
  if (objective === "none") {
    return undefined;
  }
  return product.pricesPerObjective[objective];
}
