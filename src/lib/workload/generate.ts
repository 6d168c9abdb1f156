import { invalid, isNonNegativeInt, isPositiveInt, ok, type Outcome } from "@/lib/result";
import type { ProcessInput } from "@/lib/types";

export type WorkloadSpec = {
  count: number;
  seed?: number;
  maxBurst?: number;
  maxArrival?: number;
  maxPriority?: number;
};

const DEFAULT_SEED = 123456789;

// Linear congruential generator (Numerical Recipes constants), values in [0, 1).
export function createRandom(seed: number = DEFAULT_SEED): () => number {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s / 2 ** 32;
  };
}

function randomInt(rand: () => number, min: number, max: number): number {
  return min + Math.floor(rand() * (max - min + 1));
}

export function generateWorkload(spec: WorkloadSpec): Outcome<ProcessInput[]> {
  const maxBurst = spec.maxBurst ?? 10;
  const maxArrival = spec.maxArrival ?? 10;
  const maxPriority = spec.maxPriority ?? 5;

  if (!isPositiveInt(spec.count)) return invalid(`count must be a positive integer, got ${spec.count}`);
  if (!isPositiveInt(maxBurst)) return invalid(`maxBurst must be a positive integer, got ${maxBurst}`);
  if (!isNonNegativeInt(maxArrival)) return invalid(`maxArrival must be a non-negative integer, got ${maxArrival}`);
  if (!isNonNegativeInt(maxPriority)) return invalid(`maxPriority must be a non-negative integer, got ${maxPriority}`);

  const rand = createRandom(spec.seed);
  const drafts = Array.from({ length: spec.count }, () => ({
    arrival_time: randomInt(rand, 0, maxArrival),
    burst_time: randomInt(rand, 1, maxBurst),
    priority: randomInt(rand, 0, maxPriority),
  }));

  drafts.sort((a, b) => a.arrival_time - b.arrival_time);
  return ok(drafts.map((draft, index) => ({ pid: index + 1, name: `P${index + 1}`, ...draft })));
}
