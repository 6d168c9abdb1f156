import { DEFAULT_CONFIG } from "@/lib/config";
import { createProcesses } from "@/lib/cpu/process";
import { CpuScheduler } from "@/lib/cpu/scheduler";
import { ok, type Outcome } from "@/lib/result";
import type { TraceOptions } from "@/lib/trace/events";
import type { CpuAlgorithm, ProcessInput, ScheduleRun, ScheduleStatistics } from "@/lib/types";

export { copyProcess, createProcess, createProcesses } from "@/lib/cpu/process";
export { CpuScheduler } from "@/lib/cpu/scheduler";
export { computeStatistics } from "@/lib/cpu/statistics";

export const CPU_ALGORITHMS: CpuAlgorithm[] = ["FCFS", "SJF", "PRIORITY", "RR"];

export type CpuRunOptions = TraceOptions & {
  quantum?: number;
};

export type CpuRunResult = {
  run: ScheduleRun;
  statistics: ScheduleStatistics;
};

export function runCpuAlgorithm(
  algorithm: CpuAlgorithm,
  processes: ProcessInput[],
  options: CpuRunOptions = {},
): Outcome<CpuRunResult> {
  const created = createProcesses(processes);
  if (!created.ok) return created;

  const scheduler = new CpuScheduler({ trace: options.trace });
  for (const process of created.value) {
    const admitted = scheduler.admit(process);
    if (!admitted.ok) return admitted;
  }

  const run = scheduler.run(algorithm, options.quantum ?? DEFAULT_CONFIG.quantum);
  if (!run.ok) return run;

  const statistics = scheduler.statistics();
  if (!statistics.ok) return statistics;

  return ok({ run: run.value, statistics: statistics.value });
}
