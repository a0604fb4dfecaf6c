import { readStateJson, writeStateJson } from "../platform/persistence";
import { HistoryEntry, HistoryStore } from "../lookup/types";

type HistoryState = {
  version: number;
  nextId: number;
  entries: HistoryEntry[];
};

const HISTORY_FILE = "state/history.json";
const HISTORY_VERSION = 1;
export const MAX_HISTORY_ENTRIES = 1000;

function emptyState(): HistoryState {
  return { version: HISTORY_VERSION, nextId: 1, entries: [] };
}

function loadState(): HistoryState {
  return readStateJson<HistoryState>(HISTORY_FILE, emptyState(), "history.schema.json");
}

function saveState(state: HistoryState): void {
  writeStateJson(HISTORY_FILE, state);
}

export function createHistoryStore(): HistoryStore {
  const append: HistoryStore["append"] = (prompt, result, modelName, providerId) => {
    try {
      const state = loadState();
      state.entries.push({
        id: state.nextId,
        prompt,
        result,
        modelName,
        providerId,
        createdAt: new Date().toISOString()
      });
      state.nextId += 1;
      if (state.entries.length > MAX_HISTORY_ENTRIES) {
        state.entries = state.entries.slice(state.entries.length - MAX_HISTORY_ENTRIES);
      }
      saveState(state);
      return true;
    } catch {
      return false;
    }
  };

  const remove = (id: number): boolean => {
    const state = loadState();
    const next = state.entries.filter((entry) => entry.id !== id);
    if (next.length === state.entries.length) {
      return false;
    }
    saveState({ ...state, entries: next });
    return true;
  };

  return {
    append,
    list: (limit = 20) => {
      const entries = loadState().entries;
      return entries.slice(Math.max(0, entries.length - limit)).reverse();
    },
    last: () => {
      const entries = loadState().entries;
      return entries[entries.length - 1];
    },
    remove,
    removeLast: () => {
      const last = loadState().entries.at(-1);
      return last ? remove(last.id) : false;
    },
    clear: () => {
      const state = loadState();
      const removed = state.entries.length;
      saveState({ ...state, entries: [] });
      return removed;
    },
    count: () => loadState().entries.length
  };
}
