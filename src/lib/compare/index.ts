import { DEFAULT_CONFIG } from "@/lib/config";
import { CPU_ALGORITHMS, runCpuAlgorithm } from "@/lib/cpu";
import { DISK_ALGORITHMS, DiskScheduler, type DiskBatch, type DiskResult } from "@/lib/disk";
import { invalid, ok, type Outcome } from "@/lib/result";
import type { CpuAlgorithm, Metrics, ProcessInput } from "@/lib/types";
import { extractWorkloadProfile, type WorkloadProfile } from "@/lib/workload/profile";

export type CpuCompareRow = Metrics & {
  algorithm: CpuAlgorithm;
};

export type CpuComparison = {
  workload: WorkloadProfile;
  rows: CpuCompareRow[];
  pareto: CpuAlgorithm[];
  best: CpuAlgorithm;
};

// Every CPU objective is minimised.
export type CpuObjective = "avg_wt" | "avg_tat" | "makespan";

export const CPU_OBJECTIVES: CpuObjective[] = ["avg_wt", "avg_tat", "makespan"];

const EPS = 1e-9;

// `candidate` is no worse on every objective and strictly better on at least one.
export function dominates(candidate: CpuCompareRow, target: CpuCompareRow): boolean {
  let strictly = false;
  for (const key of CPU_OBJECTIVES) {
    if (candidate[key] > target[key] + EPS) return false;
    if (candidate[key] < target[key] - EPS) strictly = true;
  }
  return strictly;
}

export function paretoFront(rows: CpuCompareRow[]): CpuCompareRow[] {
  return rows.filter((row, i) => !rows.some((other, j) => i !== j && dominates(other, row)));
}

export function compareCpuAlgorithms(
  processes: ProcessInput[],
  options: { quantum?: number } = {},
): Outcome<CpuComparison> {
  if (processes.length === 0) return invalid("cannot compare policies on an empty workload");
  const quantum = options.quantum ?? DEFAULT_CONFIG.quantum;

  const rows: CpuCompareRow[] = [];
  for (const algorithm of CPU_ALGORITHMS) {
    const result = runCpuAlgorithm(algorithm, processes, { quantum });
    if (!result.ok) return result;
    const { avg_wt, avg_tat, cpu_util, makespan, throughput } = result.value.statistics;
    rows.push({ algorithm, avg_wt, avg_tat, cpu_util, makespan, throughput });
  }

  const best = rows.reduce((winner, row) => (row.avg_wt < winner.avg_wt ? row : winner), rows[0]);

  return ok({
    workload: extractWorkloadProfile(processes),
    rows,
    pareto: paretoFront(rows).map((row) => row.algorithm),
    best: best.algorithm,
  });
}

// Ranked by total seek; ties keep policy order.
export function compareDiskAlgorithms(
  batch: DiskBatch,
  totalCylinders = DEFAULT_CONFIG.totalCylinders,
): Outcome<DiskResult[]> {
  const scheduler = DiskScheduler.create(totalCylinders);
  if (!scheduler.ok) return scheduler;
  const sweep: DiskBatch = { ...batch, direction: batch.direction ?? DEFAULT_CONFIG.direction };

  const results: DiskResult[] = [];
  for (const algorithm of DISK_ALGORITHMS) {
    const result = scheduler.value.run(algorithm, sweep);
    if (!result.ok) return result;
    results.push(result.value);
  }

  return ok([...results].sort((a, b) => a.total_seek - b.total_seek));
}
