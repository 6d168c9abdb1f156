import type { ProcessInput } from "@/lib/types";

export type WorkloadProfile = {
  n_procs: number;
  total_burst: number;
  avg_burst: number;
  std_burst: number;
  burst_variance: number;
  arrival_spread: number;
};

function std(values: number[]): number {
  if (!values.length) return 0;
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function extractWorkloadProfile(processes: ProcessInput[]): WorkloadProfile {
  const bursts = processes.map((process) => process.burst_time);
  const arrivals = processes.map((process) => process.arrival_time ?? 0);
  const totalBurst = bursts.reduce((sum, value) => sum + value, 0);
  const avgBurst = bursts.length > 0 ? totalBurst / bursts.length : 0;
  const stdBurst = std(bursts);

  return {
    n_procs: processes.length,
    total_burst: totalBurst,
    avg_burst: avgBurst,
    std_burst: stdBurst,
    // Coefficient of variation; high values favour SJF over FCFS.
    burst_variance: stdBurst / Math.max(avgBurst, 1),
    arrival_spread: arrivals.length > 0 ? Math.max(...arrivals) - Math.min(...arrivals) : 0,
  };
}
