// pattern: Imperative Shell

/**
 * Runs one product search: a single model call, then extraction.
 * Every failure is folded into the returned outcome; `search` never rejects.
 */

import type { ModelProvider } from "../model/types.js";
import { ModelError, responseText } from "../model/types.js";
import { extractProductsWithReport, type ExtractionReport } from "./extractor.js";
import { buildSearchRequest, type SearchModelSettings } from "./prompt.js";
import type { SearchOutcome, SearchRequest } from "./types.js";

export type ProductSearchDependencies = {
  readonly model: ModelProvider;
  readonly settings: SearchModelSettings;
};

export type ProductSearch = {
  search(request: SearchRequest): Promise<SearchOutcome>;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function diagnosticOf(outcome: SearchOutcome): string | null {
  return outcome.status === "failed" ? outcome.diagnostic : null;
}

export function createProductSearch(deps: ProductSearchDependencies): ProductSearch {
  return {
    async search(request: SearchRequest): Promise<SearchOutcome> {
      console.log(
        `[search] querying ${deps.settings.model} for "${request.productName}" in "${request.category}"`
      );

      let rawText: string;
      try {
        const response = await deps.model.complete(buildSearchRequest(request, deps.settings));
        rawText = responseText(response);
      } catch (error) {
        const diagnostic = `API request failed: ${errorMessage(error)}`;
        const transient = error instanceof ModelError && error.retryable;
        console.error(`[search] ${diagnostic}${transient ? " (transient, search again later)" : ""}`);
        return { status: "failed", products: [], failure: "transport", diagnostic };
      }

      let report: ExtractionReport;
      try {
        report = extractProductsWithReport(rawText);
      } catch (error) {
        const diagnostic = `Could not parse JSON from API response: ${errorMessage(error)}`;
        console.error(`[search] ${diagnostic}`);
        return { status: "failed", products: [], failure: "extraction", diagnostic };
      }

      if (report.skipped > 0) {
        console.warn(`[search] skipped ${report.skipped} malformed product record(s)`);
      }

      if (report.products.length === 0) {
        console.log("[search] no products found");
        return { status: "empty", products: [] };
      }

      console.log(`[search] found ${report.products.length} product(s)`);
      return { status: "found", products: report.products };
    },
  };
}
