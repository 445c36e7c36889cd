import { createStore } from "zustand/vanilla";

export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogEntry = {
  id: string;
  time: number;
  level: LogLevel;
  message: string;
  scope?: string;
  data?: unknown;
};

type ConsoleState = {
  entries: LogEntry[];
  maxEntries: number;
  levels: Record<LogLevel, boolean>;
  search: string;
  push: (entry: LogEntry) => void;
  clear: () => void;
  toggleLevel: (level: LogLevel) => void;
  setSearch: (value: string) => void;
};

const parseMaxEntries = (raw: string | undefined) => {
  const n = Number(raw ?? "400");
  return Number.isInteger(n) && n > 0 ? n : 400;
};

export const consoleStore = createStore<ConsoleState>((set, get) => ({
  entries: [],
  maxEntries: parseMaxEntries(process.env.URDF_LOG_MAX_ENTRIES),
  levels: { info: true, warn: true, error: true, debug: false },
  search: "",
  push: (entry) =>
    set((state) => {
      const next = [...state.entries, entry];
      const overflow = next.length - get().maxEntries;
      if (overflow > 0) next.splice(0, overflow);
      return { entries: next };
    }),
  clear: () => set({ entries: [] }),
  toggleLevel: (level) =>
    set((state) => ({ levels: { ...state.levels, [level]: !state.levels[level] } })),
  setSearch: (value) => set({ search: value }),
}));

/** Entries visible under the current level toggles and search text. */
export function selectVisibleEntries(state: Pick<ConsoleState, "entries" | "levels" | "search">): LogEntry[] {
  const needle = state.search.trim().toLowerCase();
  return state.entries.filter((entry) => {
    if (!state.levels[entry.level]) return false;
    if (!needle) return true;
    const scope = entry.scope?.toLowerCase() ?? "";
    return entry.message.toLowerCase().includes(needle) || scope.includes(needle);
  });
}
