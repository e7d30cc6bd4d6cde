// pattern: Imperative Shell

/**
 * Per-session context. Each interactive session owns its history; sessions
 * share only the product search (and through it the read-only credential).
 */

import { randomUUID } from "node:crypto";
import { createHistoryEntry, createHistoryStore, type HistoryStore } from "../search/history.js";
import type { ProductSearch } from "../search/orchestrator.js";
import type { HistoryEntry, SearchRequest } from "../search/types.js";

export type SessionDependencies = {
  readonly search: ProductSearch;
  readonly now?: () => Date;
};

export type Session = {
  readonly id: string;
  readonly history: HistoryStore;
  runSearch(request: SearchRequest): Promise<HistoryEntry>;
};

export function createSession(deps: SessionDependencies): Session {
  const history = createHistoryStore();
  const now = deps.now ?? (() => new Date());

  return {
    id: randomUUID(),
    history,
    async runSearch(request: SearchRequest): Promise<HistoryEntry> {
      const outcome = await deps.search.search(request);
      const entry = createHistoryEntry(request, outcome, now());
      history.append(entry);
      return entry;
    },
  };
}
