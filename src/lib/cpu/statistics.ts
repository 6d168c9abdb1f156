import { fail, ok, type Outcome } from "@/lib/result";
import type { DispatchSlice, PerProcessRow, ProcessDescriptor, ScheduleStatistics } from "@/lib/types";

function mean(values: number[]): number {
  if (!values.length) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function sliceLength(slice: DispatchSlice): number {
  return slice.end - slice.start;
}

export function computeStatistics(
  completed: ProcessDescriptor[],
  timeline: DispatchSlice[],
  clock: number,
): Outcome<ScheduleStatistics> {
  if (completed.length === 0) {
    return fail("EmptyResult", "no process has completed yet");
  }

  const perProcess: PerProcessRow[] = completed.map((process) => ({
    pid: process.pid,
    name: process.name,
    at: process.arrival_time,
    bt: process.burst_time,
    ct: process.completion_time ?? process.arrival_time + process.turnaround_time,
    wt: process.waiting_time,
    tat: process.turnaround_time,
  }));

  const makespan = clock;
  const busy = timeline.reduce((sum, slice) => sum + sliceLength(slice), 0);

  return ok({
    per_process: perProcess,
    avg_wt: mean(perProcess.map((row) => row.wt)),
    avg_tat: mean(perProcess.map((row) => row.tat)),
    cpu_util: makespan > 0 ? busy / makespan : 0,
    makespan,
    throughput: makespan > 0 ? completed.length / makespan : 0,
  });
}
