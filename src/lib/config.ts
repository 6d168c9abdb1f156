import type { SweepDirection } from "@/lib/disk/types";
import type { PlacementPolicy } from "@/lib/memory/types";
import { invalid, isPositiveInt, ok, type Outcome } from "@/lib/result";

export type SimulatorConfig = {
  quantum: number;
  totalMemory: number;
  totalCylinders: number;
  pageSize: number;
  placement: PlacementPolicy;
  direction: SweepDirection;
};

export const DEFAULT_CONFIG: Readonly<SimulatorConfig> = {
  quantum: 2,
  totalMemory: 100,
  totalCylinders: 200,
  pageSize: 4,
  placement: "FIRST",
  direction: "up",
};

const POSITIVE_KEYS = ["quantum", "totalMemory", "totalCylinders", "pageSize"] as const;

export function resolveConfig(overrides: Partial<SimulatorConfig> = {}): Outcome<SimulatorConfig> {
  const config: SimulatorConfig = { ...DEFAULT_CONFIG, ...overrides };

  for (const key of POSITIVE_KEYS) {
    if (!isPositiveInt(config[key])) {
      return invalid(`config.${key} must be a positive integer, got ${config[key]}`);
    }
  }
  if (!["FIRST", "BEST", "WORST"].includes(config.placement)) {
    return invalid(`config.placement must be FIRST, BEST or WORST, got ${config.placement}`);
  }
  if (config.direction !== "up" && config.direction !== "down") {
    return invalid(`config.direction must be up or down, got ${String(config.direction)}`);
  }

  return ok(config);
}
