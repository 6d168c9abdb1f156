export type CpuAlgorithm = "FCFS" | "SJF" | "PRIORITY" | "RR";
export type ProcessState = "NEW" | "READY" | "RUNNING" | "WAITING" | "TERMINATED";

export interface ProcessInput {
  pid: number;
  name?: string;
  priority?: number;
  burst_time: number;
  arrival_time?: number;
}

export interface ProcessDescriptor {
  pid: number;
  name: string;
  priority: number;
  burst_time: number;
  arrival_time: number;
  state: ProcessState;
  waiting_time: number;
  turnaround_time: number;
  remaining_time: number;
  completion_time: number | null;
}

export interface DispatchSlice {
  pid: number;
  name: string;
  start: number;
  end: number;
}

export interface ScheduleRun {
  algorithm: CpuAlgorithm;
  quantum?: number;
  slices: DispatchSlice[];
  completed: ProcessDescriptor[];
  clock: number;
}

export interface PerProcessRow {
  pid: number;
  name: string;
  at: number;
  bt: number;
  ct: number;
  wt: number;
  tat: number;
}

export interface Metrics {
  avg_wt: number;
  avg_tat: number;
  cpu_util: number;
  makespan: number;
  throughput: number;
}

export interface ScheduleStatistics extends Metrics {
  per_process: PerProcessRow[];
}

export interface SchedulerSnapshot {
  clock: number;
  ready: ProcessDescriptor[];
  completed: ProcessDescriptor[];
  gantt: DispatchSlice[];
}
