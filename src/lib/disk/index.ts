import { DEFAULT_CONFIG } from "@/lib/config";
import { DiskScheduler } from "@/lib/disk/scheduler";
import type { DiskAlgorithm, DiskBatch, DiskResult } from "@/lib/disk/types";
import type { Outcome } from "@/lib/result";
import type { TraceOptions } from "@/lib/trace/events";

export * from "@/lib/disk/types";
export { DiskScheduler } from "@/lib/disk/scheduler";

export const DISK_ALGORITHMS: DiskAlgorithm[] = ["FCFS", "SSTF", "SCAN", "CSCAN"];

export function runDiskAlgorithm(
  algorithm: DiskAlgorithm,
  batch: DiskBatch,
  totalCylinders = DEFAULT_CONFIG.totalCylinders,
  options: TraceOptions = {},
): Outcome<DiskResult> {
  const scheduler = DiskScheduler.create(totalCylinders, options);
  if (!scheduler.ok) return scheduler;
  return scheduler.value.run(algorithm, batch);
}
