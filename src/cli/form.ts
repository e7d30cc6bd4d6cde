// pattern: Imperative Shell

/**
 * Interactive search form. Reads answers through an `Ask` function so the
 * flow can be driven from readline or from a script in tests.
 */

import {
  PRICE_OBJECTIVES,
  PRICE_OBJECTIVE_LABELS,
  isPriceObjective,
  type PriceObjective,
  type SearchRequest,
} from "../search/types.js";

export type Ask = (prompt: string) => Promise<string>;
export type Write = (text: string) => void;

export type SearchFormInput = {
  readonly category: string;
  readonly productName: string;
  readonly techSpec: string;
  readonly priceCalcObjective: PriceObjective;
  readonly unitLabel?: string;
};

/**
 * Accepts a 1-based option number or the objective key; blank means "none".
 */
export function parseObjective(input: string): PriceObjective | null {
  const value = input.trim().toLowerCase();
  if (value === "") {
    return "none";
  }
  if (/^\d+$/.test(value)) {
    return PRICE_OBJECTIVES[Number(value) - 1] ?? null;
  }
  return isPriceObjective(value) ? value : null;
}

export function toSearchRequest(input: SearchFormInput): SearchRequest {
  const request: SearchRequest = {
    category: input.category.trim(),
    productName: input.productName.trim(),
    techSpec: input.techSpec.trim(),
    priceCalcObjective: input.priceCalcObjective,
  };
  const unitLabel = input.unitLabel?.trim();
  if (input.priceCalcObjective === "unit" && unitLabel) {
    return { ...request, unitLabel };
  }
  return request;
}

export function objectiveMenu(): string {
  return PRICE_OBJECTIVES.map((objective, index) => `  ${index + 1}. ${objective} - ${PRICE_OBJECTIVE_LABELS[objective]}`).join(
    "\n"
  );
}

async function askRequired(ask: Ask, write: Write, prompt: string, missing: string): Promise<string> {
  for (;;) {
    const answer = (await ask(prompt)).trim();
    if (answer) {
      return answer;
    }
    write(missing);
  }
}

async function askMultiline(ask: Ask): Promise<string> {
  const lines: Array<string> = [];
  for (;;) {
    const line = await ask(lines.length === 0 ? "Technical specification (finish with an empty line): " : "... ");
    if (line.trim() === "") {
      return lines.join("\n");
    }
    lines.push(line);
  }
}

async function askObjective(ask: Ask, write: Write): Promise<PriceObjective> {
  write("Price calculation objective:");
  write(objectiveMenu());
  for (;;) {
    const objective = parseObjective(await ask("Select 1-5 or a key [none]: "));
    if (objective) {
      return objective;
    }
    write(`Please choose one of: ${PRICE_OBJECTIVES.join(", ")}`);
  }
}

export async function promptSearchRequest(ask: Ask, write: Write): Promise<SearchRequest> {
  const category = await askRequired(
    ask,
    write,
    "Product category/group (e.g. kuras / degalai, Smartphones, Vitamins): ",
    "Please enter the product category."
  );
  const productName = await askRequired(
    ask,
    write,
    "Product name (e.g. benzinas, iPhone, Vitamin D): ",
    "Please enter the product name."
  );
  const techSpec = await askMultiline(ask);
  const priceCalcObjective = await askObjective(ask, write);

  let unitLabel: string | undefined;
  if (priceCalcObjective === "unit") {
    unitLabel = await ask("Unit type (e.g. tablet, pill, piece; empty for generic 'unit'): ");
  } else if (priceCalcObjective !== "none") {
    write(`Products will be evaluated based on ${PRICE_OBJECTIVE_LABELS[priceCalcObjective]}`);
  }

  return toSearchRequest({ category, productName, techSpec, priceCalcObjective, unitLabel });
}
