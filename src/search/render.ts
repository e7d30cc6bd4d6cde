// pattern: Functional Core

/**
 * Plain-text rendering of search results and session history for the terminal.
 */

import {
  pricePerObjective,
  type HistoryEntry,
  type PriceObjective,
  type Product,
  type SearchOutcome,
  type SearchRequest,
} from "./types.js";

const INDENT = "   ";

export const NO_RESULTS_MESSAGE = "No products found matching your specifications.";
export const FAILED_RESULTS_MESSAGE = "No products found or error occurred during analysis.";
export const EMPTY_HISTORY_MESSAGE = "No search history yet. Search for products to see your history here.";

/**
 * Two decimals unless the model gave more precision (fuel is priced to 0.001).
 */
export function formatEuro(value: number): string {
  const fixed = value.toFixed(2);
  return `€${Number(fixed) === value ? fixed : String(value)}`;
}

export function unitSuffix(objective: PriceObjective, product: Product): string {
  switch (objective) {
    case "none":
      return "";
    case "unit":
      return `/${product.unitType ?? "unit"}`;
    case "kg":
      return "/kg";
    case "liter":
      return "/L";
    case "package":
      return "/pkg";
  }
}

export function objectiveTitle(objective: PriceObjective): string {
  return `Price per ${objective.charAt(0).toUpperCase()}${objective.slice(1)}`;
}

/**
 * "€2.10/kg", or null when the request has no objective or the model left the
 * matching price out.
 */
export function formatPricePerObjective(product: Product, objective: PriceObjective): string | null {
  const price = pricePerObjective(product, objective);
  if (price === undefined) {
    return null;
  }
  return `${formatEuro(price)}${unitSuffix(objective, product)}`;
}

export function productTitle(product: Product, index: number, objective: PriceObjective): string {
  const name = product.productName || "Unknown Product";
  const title = `${index + 1}. ${name} - ${formatEuro(product.productPrice)}`;
  const perObjective = formatPricePerObjective(product, objective);
  return perObjective ? `${title} (${perObjective})` : title;
}

function indentBlock(text: string, indent: string): Array<string> {
  return text.split("\n").map((line) => `${indent}${line}`);
}

export function renderProduct(product: Product, index: number, objective: PriceObjective): string {
  const lines = [productTitle(product, index, objective)];

  lines.push(`${INDENT}Provider: ${product.provider || "N/A"}`);
  lines.push(`${INDENT}Website: ${product.providerWebsite || "N/A"}`);
  if (product.providerUrl) {
    lines.push(`${INDENT}Product Link: ${product.providerUrl}`);
  }
  lines.push(`${INDENT}SKU/ID: ${product.productSku ?? "N/A"}`);
  lines.push(`${INDENT}Price: ${formatEuro(product.productPrice)}`);

  const perObjective = formatPricePerObjective(product, objective);
  if (perObjective) {
    lines.push(`${INDENT}${objectiveTitle(objective)}: ${perObjective}`);
  }

  lines.push(`${INDENT}Product Properties:`);
  const properties = Object.entries(product.productProperties);
  if (properties.length === 0) {
    lines.push(`${INDENT}  No detailed properties available.`);
  } else {
    for (const [key, value] of properties) {
      lines.push(`${INDENT}  - ${key}: ${value}`);
    }
  }

  lines.push(`${INDENT}Technical Evaluation:`);
  lines.push(...indentBlock(product.evaluation || "No evaluation available.", `${INDENT}  `));

  return lines.join("\n");
}

export function renderRawJson(products: ReadonlyArray<Product>): string {
  return JSON.stringify(products, null, 2);
}

export function renderResults(request: SearchRequest, outcome: SearchOutcome): string {
  switch (outcome.status) {
    case "failed":
      return `${outcome.diagnostic}\n${FAILED_RESULTS_MESSAGE}`;
    case "empty":
      return NO_RESULTS_MESSAGE;
    case "found": {
      const header = `Found ${outcome.products.length} Products for ${request.productName} in ${request.category} category`;
      const products = outcome.products.map((product, index) =>
        renderProduct(product, index, request.priceCalcObjective)
      );
      return [header, ...products].join("\n\n");
    }
  }
}

export function historySummary(entry: HistoryEntry, number: number): string {
  const { request, outcome } = entry;
  const objective =
    request.priceCalcObjective === "none" ? "" : ` (Price per ${request.priceCalcObjective})`;
  const count = `${outcome.products.length} products found${outcome.status === "failed" ? " (search failed)" : ""}`;
  return `${number}. ${entry.timestamp} - [${request.category}] ${request.productName}${objective} - ${count}`;
}

/**
 * Most recent first; the number shown is what `historyEntryAt` takes.
 */
export function renderHistory(entries: ReadonlyArray<HistoryEntry>): string {
  if (entries.length === 0) {
    return EMPTY_HISTORY_MESSAGE;
  }
  return [...entries]
    .reverse()
    .map((entry, index) => historySummary(entry, index + 1))
    .join("\n");
}

export function historyEntryAt(entries: ReadonlyArray<HistoryEntry>, number: number): HistoryEntry | null {
  if (!Number.isInteger(number) || number < 1 || number > entries.length) {
    return null;
  }
  return entries[entries.length - number] ?? null;
}

export function renderHistoryEntry(entry: HistoryEntry): string {
  const { request, outcome } = entry;
  const lines = [
    `${entry.timestamp}`,
    `Category: ${request.category}`,
    `Product: ${request.productName}`,
    `Search Query:`,
    ...indentBlock(request.techSpec || "(none)", INDENT),
  ];

  if (request.priceCalcObjective !== "none") {
    lines.push(`Price Calculation: Price per ${request.priceCalcObjective}`);
  }
  lines.push(`Results: ${outcome.products.length} products found`);

  return `${lines.join("\n")}\n\n${renderResults(request, outcome)}`;
}
