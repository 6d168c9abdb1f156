import { createStore } from "zustand/vanilla";

import { formatTraceEvent, parseEventTime, type TraceEvent, type TraceSink } from "@/lib/trace/events";

export type TraceState = {
  events: TraceEvent[];
  lines: string[];
  limit: number;
  record: (event: TraceEvent) => void;
  clear: () => void;
  setLimit: (limit: number) => void;
};

const DEFAULT_LIMIT = 10_000;

function trimTail<T>(values: T[], limit: number): T[] {
  return values.length > limit ? values.slice(values.length - limit) : values;
}

export function createTraceStore(limit: number = DEFAULT_LIMIT) {
  return createStore<TraceState>((set) => ({
    events: [],
    lines: [],
    limit: Math.max(1, Math.floor(limit)),
    record: (event) =>
      set((state) => ({
        events: trimTail([...state.events, event], state.limit),
        lines: trimTail([...state.lines, formatTraceEvent(event)], state.limit),
      })),
    clear: () => set({ events: [], lines: [] }),
    setLimit: (nextLimit) =>
      set((state) => {
        const bounded = Math.max(1, Math.floor(nextLimit));
        return {
          limit: bounded,
          events: trimTail(state.events, bounded),
          lines: trimTail(state.lines, bounded),
        };
      }),
  }));
}

export type TraceStore = ReturnType<typeof createTraceStore>;

export function traceSink(store: TraceStore): TraceSink {
  return (event) => store.getState().record(event);
}

// Lines without a timestamp (memory, disk, banker) are kept as-is.
export function linesUpTo(store: TraceStore, t: number): string[] {
  return store.getState().lines.filter((line) => {
    const at = parseEventTime(line);
    return at === null || at <= t;
  });
}
