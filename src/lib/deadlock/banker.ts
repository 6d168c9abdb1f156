import type { BankerState, RequestDecision, SafetyVerdict } from "@/lib/deadlock/types";
import { invalid, ok, type Outcome } from "@/lib/result";
import type { TraceOptions } from "@/lib/trace/events";
import {
  addVectors,
  cloneMatrix,
  cloneVector,
  fitsWithin,
  subVectors,
  validateMatrix,
  validateVector,
  type ResourceMatrix,
  type ResourceVector,
} from "@/lib/vector";

export function validateBankerState(state: BankerState): Outcome<BankerState> {
  const width = state.available.length;
  const rows = state.allocation.length;

  const available = validateVector(state.available, width, "available");
  if (!available.ok) return available;
  const allocation = validateMatrix(state.allocation, rows, width, "allocation");
  if (!allocation.ok) return allocation;
  const maxNeed = validateMatrix(state.max_need, rows, width, "max_need");
  if (!maxNeed.ok) return maxNeed;

  return ok({ allocation: allocation.value, max_need: maxNeed.value, available: available.value });
}

export function computeNeed(allocation: ResourceMatrix, maxNeed: ResourceMatrix): ResourceMatrix {
  return maxNeed.map((row, p) => subVectors(row, allocation[p]));
}

// Negative need entries are allowed and always fit.
function runSafety(state: BankerState, options: TraceOptions): SafetyVerdict {
  const need = computeNeed(state.allocation, state.max_need);
  const finish = state.allocation.map(() => false);
  const sequence: number[] = [];
  let work: ResourceVector = cloneVector(state.available);

  while (sequence.length < finish.length) {
    const next = finish.findIndex((done, p) => !done && fitsWithin(need[p], work));
    if (next < 0) {
      const deadlocked = finish.flatMap((done, p) => (done ? [] : [p]));
      options.trace?.({ kind: "blocked", deadlocked });
      return { status: "UNSAFE", sequence, deadlocked, need, work };
    }
    work = addVectors(work, state.allocation[next]);
    finish[next] = true;
    sequence.push(next);
    options.trace?.({ kind: "finish", process: next, work: cloneVector(work) });
  }

  return { status: "SAFE", sequence, need, work };
}

export function detectDeadlock(state: BankerState, options: TraceOptions = {}): Outcome<SafetyVerdict> {
  const checked = validateBankerState(state);
  if (!checked.ok) return checked;
  return ok(runSafety(checked.value, options));
}

export function evaluateRequest(
  state: BankerState,
  process: number,
  request: ResourceVector,
  options: TraceOptions = {},
): Outcome<RequestDecision> {
  const checked = validateBankerState(state);
  if (!checked.ok) return checked;
  const { allocation, max_need: maxNeed, available } = checked.value;

  if (!Number.isInteger(process) || process < 0 || process >= allocation.length) {
    return invalid(`process index ${process} is out of range`);
  }
  const req = validateVector(request, available.length, "request");
  if (!req.ok) return req;

  const need = subVectors(maxNeed[process], allocation[process]);
  if (!fitsWithin(req.value, need)) {
    return invalid(`request of P${process} exceeds its remaining need [${need.join(", ")}]`);
  }
  if (!fitsWithin(req.value, available)) {
    const shortfall = req.value.map((amount, r) => Math.max(0, amount - available[r]));
    return ok({ status: "DENIED_UNAVAILABLE", shortfall });
  }

  const nextAllocation = cloneMatrix(allocation);
  nextAllocation[process] = addVectors(allocation[process], req.value);
  const tentative: BankerState = {
    allocation: nextAllocation,
    max_need: cloneMatrix(maxNeed),
    available: subVectors(available, req.value),
  };

  const verdict = runSafety(tentative, options);
  if (verdict.status === "UNSAFE") {
    return ok({ status: "DENIED_UNSAFE", deadlocked: verdict.deadlocked });
  }
  return ok({ status: "GRANTED", state: tentative, sequence: verdict.sequence });
}
