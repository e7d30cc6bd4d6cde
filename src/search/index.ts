// pattern: Functional Core

export type {
  PriceObjective,
  PricedObjective,
  SearchRequest,
  Product,
  SearchResult,
  SearchFailure,
  SearchOutcome,
  HistoryEntry,
} from "./types.js";
export {
  PRICE_OBJECTIVES,
  PRICED_OBJECTIVES,
  PRICE_OBJECTIVE_LABELS,
  customUnitLabel,
  isPriceObjective,
  pricePerObjective,
} from "./types.js";
export { buildPrompt, buildSearchRequest, DEFAULT_MARKET, type PromptOptions, type SearchModelSettings } from "./prompt.js";
export { ExtractionError, extractProducts, extractProductsWithReport, type ExtractionReport } from "./extractor.js";
export { createProductSearch, diagnosticOf, type ProductSearch, type ProductSearchDependencies } from "./orchestrator.js";
export { createHistoryStore, createHistoryEntry, formatTimestamp, type HistoryStore } from "./history.js";
export {
  renderResults,
  renderRawJson,
  renderHistory,
  renderHistoryEntry,
  historyEntryAt,
  unitSuffix,
} from "./render.js";
