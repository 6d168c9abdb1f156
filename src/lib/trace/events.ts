import type { ProcessState } from "@/lib/types";

export type TraceEvent =
  | { kind: "admit"; t: number; pid: number; name: string }
  | { kind: "transition"; t: number; pid: number; name: string; from: ProcessState; to: ProcessState }
  | { kind: "dispatch"; t: number; pid: number; name: string; duration: number }
  | { kind: "allocate"; pid: number; address: number; size: number }
  | { kind: "split"; address: number; size: number; remainder: number }
  | { kind: "free"; pid: number; address: number; size: number }
  | { kind: "merge"; address: number; size: number; absorbed: number }
  | { kind: "finish"; process: number; work: number[] }
  | { kind: "blocked"; deadlocked: number[] }
  | { kind: "seek"; from: number; to: number; distance: number }
  | { kind: "acquire"; holder: string; value: number }
  | { kind: "block"; holder: string; queued: number }
  | { kind: "release"; holder: string; value: number }
  | { kind: "wake"; holder: string };

export type TraceSink = (event: TraceEvent) => void;

export type TraceOptions = {
  trace?: TraceSink;
};

const EVENT_TIME_REGEX = /^t\s*=\s*(\d+)/i;

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.kind) {
    case "admit":
      return `t=${event.t}: ${event.name} NEW -> READY`;
    case "transition":
      return `t=${event.t}: ${event.name} ${event.from} -> ${event.to}`;
    case "dispatch":
      return `t=${event.t}: ${event.name} runs for ${event.duration}`;
    case "allocate":
      return `mem: P${event.pid} <- [${event.address}, ${event.address + event.size})`;
    case "split":
      return `mem: split at ${event.address} (${event.size} + ${event.remainder})`;
    case "free":
      return `mem: P${event.pid} freed [${event.address}, ${event.address + event.size})`;
    case "merge":
      return `mem: merged ${event.absorbed + 1} extents at ${event.address} (size ${event.size})`;
    case "finish":
      return `bank: P${event.process} can finish, work=[${event.work.join(", ")}]`;
    case "blocked":
      return `bank: no eligible process, deadlocked=[${event.deadlocked.join(", ")}]`;
    case "seek":
      return `disk: ${event.from} -> ${event.to} (seek ${event.distance})`;
    case "acquire":
      return `sem: ${event.holder} acquired (value ${event.value})`;
    case "block":
      return `sem: ${event.holder} waiting (${event.queued} queued)`;
    case "release":
      return `sem: ${event.holder} released (value ${event.value})`;
    case "wake":
      return `sem: ${event.holder} woken`;
  }
}

export function parseEventTime(line: string): number | null {
  const match = line.match(EVENT_TIME_REGEX);
  if (!match?.[1]) return null;
  const parsed = Number.parseInt(match[1], 10);
  return Number.isFinite(parsed) ? parsed : null;
}
