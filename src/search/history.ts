// pattern: Imperative Shell

/**
 * Append-only record of the searches made in one session.
 * Lives only as long as the session that owns it.
 */

import type { HistoryEntry, SearchOutcome, SearchRequest } from "./types.js";

export type HistoryStore = {
  append(entry: HistoryEntry): void;
  all(): ReadonlyArray<HistoryEntry>;
  readonly size: number;
};

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Local time as "YYYY-MM-DD HH:MM:SS", independent of the process locale.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

function freezeOutcome(outcome: SearchOutcome): SearchOutcome {
  return Object.freeze({ ...outcome, products: Object.freeze([...outcome.products]) });
}

export function createHistoryEntry(
  request: SearchRequest,
  outcome: SearchOutcome,
  now: Date = new Date()
): HistoryEntry {
  return Object.freeze({
    timestamp: formatTimestamp(now),
    request: Object.freeze({ ...request }),
    outcome: freezeOutcome(outcome),
  });
}

export function createHistoryStore(): HistoryStore {
  const entries: Array<HistoryEntry> = [];

  return {
    append(entry: HistoryEntry): void {
      entries.push(
        Object.freeze({
          timestamp: entry.timestamp,
          request: Object.freeze({ ...entry.request }),
          outcome: freezeOutcome(entry.outcome),
        })
      );
    },
    all(): ReadonlyArray<HistoryEntry> {
      return [...entries];
    },
    get size(): number {
      return entries.length;
    },
  };
}
