import { ERROR_CODES, printError } from "../errors";
import { HistoryEntry, HistoryStore } from "../lookup/types";

export function formatEntry(entry: HistoryEntry): string {
  return `#${entry.id} [${entry.createdAt}] ${entry.providerId}/${entry.modelName}\n  > ${entry.prompt}\n  ${entry.result}`;
}

export function runHistoryList(history: HistoryStore, rawLimit?: string): void {
  const limit = rawLimit === undefined ? undefined : Number.parseInt(rawLimit, 10);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    printError(ERROR_CODES.invalidArgument, "--limit must be a positive integer.");
    process.exitCode = 1;
    return;
  }
  const entries = history.list(limit);
  if (entries.length === 0) {
    console.log("History is empty.");
    return;
  }
  for (const entry of entries) {
    console.log(formatEntry(entry));
  }
}

export function runHistoryLast(history: HistoryStore): void {
  const last = history.last();
  console.log(last ? formatEntry(last) : "History is empty.");
}

export function runHistoryDelete(history: HistoryStore, rawId: string): void {
  const id = Number.parseInt(rawId, 10);
  if (!Number.isInteger(id) || id < 1) {
    printError(ERROR_CODES.invalidArgument, "History id must be a positive integer.");
    process.exitCode = 1;
    return;
  }
  if (!history.remove(id)) {
    printError(ERROR_CODES.invalidArgument, `No history entry with id ${id}.`);
    process.exitCode = 1;
    return;
  }
  console.log(`Deleted history entry #${id}.`);
}

export function runHistoryDeleteLast(history: HistoryStore): void {
  console.log(history.removeLast() ? "Deleted the last history entry." : "History is empty.");
}

export function runHistoryTotal(history: HistoryStore): void {
  console.log(`History entries: ${history.count()}`);
}

export function runHistoryClear(history: HistoryStore): void {
  const removed = history.clear();
  console.log(`Cleared ${removed} history ${removed === 1 ? "entry" : "entries"}.`);
}
