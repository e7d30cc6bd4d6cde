// pattern: Imperative Shell

/**
 * REPL command dispatch. Each command writes its output through `write`;
 * only `exit` ends the loop.
 */

import type { Session } from "../session/session.js";
import {
  EMPTY_HISTORY_MESSAGE,
  historyEntryAt,
  renderHistory,
  renderHistoryEntry,
  renderRawJson,
  renderResults,
} from "../search/render.js";
import { promptSearchRequest, type Ask, type Write } from "./form.js";

export type CommandContext = {
  readonly session: Session;
  readonly ask: Ask;
  readonly write: Write;
  readonly market: string;
};

export type CommandResult = "continue" | "exit";

export const HELP_TEXT = `Commands:
  search      describe a product and search the market
  history     list past searches, most recent first
  show <n>    show search <n> from the history in full
  json [n]    raw JSON of search <n> (default: the latest)
  about       what this tool does
  help        this list
  exit        quit`;

export function aboutText(market: string): string {
  return `Market Product Analyzer

Finds and compares products available in the ${market} based on the technical
specification you provide. A web-search-enabled language model looks up
current offers from retailers and evaluates each product against your
requirements.

How to use:
  1. Enter the product category or group (e.g. "kuras / degalai", Smartphones)
  2. Enter the product name (e.g. "benzinas", iPhone)
  3. Enter the technical specification (e.g. "95 oktaninio skaičiaus arba 95 benzinas")
  4. Optionally choose a price calculation objective (per unit, kg, liter, package)
  5. Review provider, price, per-unit price, properties and evaluation per product

Tips for best results:
  - Be specific in the technical specification
  - Use the local-language product names retailers use
  - Searches take one to two minutes; prices are as reported by the model`;
}

function parseHistoryNumber(arg: string | undefined, fallback: number | null): number | null {
  if (arg === undefined) {
    return fallback;
  }
  return /^\d+$/.test(arg) ? Number(arg) : null;
}

async function runSearchCommand(context: CommandContext): Promise<void> {
  const request = await promptSearchRequest(context.ask, context.write);
  context.write(
    `\nAnalyzing ${context.market} for ${request.productName} in ${request.category} category... (this may take 1-2 minutes)\n`
  );
  const entry = await context.session.runSearch(request);
  context.write(renderResults(entry.request, entry.outcome));
}

function showHistoryEntry(context: CommandContext, arg: string | undefined, asJson: boolean): void {
  const entries = context.session.history.all();
  const number = parseHistoryNumber(arg, asJson ? 1 : null);
  if (number === null) {
    context.write(asJson ? "Usage: json [n]" : "Usage: show <n>");
    return;
  }

  const entry = historyEntryAt(entries, number);
  if (!entry) {
    context.write(
      entries.length === 0
        ? EMPTY_HISTORY_MESSAGE
        : `No search #${number}; history has ${entries.length} entr${entries.length === 1 ? "y" : "ies"}.`
    );
    return;
  }

  context.write(asJson ? renderRawJson(entry.outcome.products) : renderHistoryEntry(entry));
}

export async function runCommand(line: string, context: CommandContext): Promise<CommandResult> {
  const [command = "", arg] = line.trim().split(/\s+/);

  switch (command.toLowerCase()) {
    case "":
      return "continue";
    case "search":
      await runSearchCommand(context);
      return "continue";
    case "history":
      context.write(renderHistory(context.session.history.all()));
      return "continue";
    case "show":
      showHistoryEntry(context, arg, false);
      return "continue";
    case "json":
      showHistoryEntry(context, arg, true);
      return "continue";
    case "about":
      context.write(aboutText(context.market));
      return "continue";
    case "help":
      context.write(HELP_TEXT);
      return "continue";
    case "exit":
    case "quit":
      return "exit";
    default:
      context.write(`Unknown command: ${command}\n${HELP_TEXT}`);
      return "continue";
  }
}
