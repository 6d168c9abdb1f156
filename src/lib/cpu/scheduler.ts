import { copyProcess } from "@/lib/cpu/process";
import { computeStatistics } from "@/lib/cpu/statistics";
import { invalid, isNonNegativeInt, isPositiveInt, ok, type Outcome } from "@/lib/result";
import type { TraceOptions, TraceSink } from "@/lib/trace/events";
import type {
  CpuAlgorithm,
  DispatchSlice,
  ProcessDescriptor,
  ProcessState,
  ScheduleRun,
  ScheduleStatistics,
  SchedulerSnapshot,
} from "@/lib/types";

type OrderKey = "arrival_time" | "burst_time" | "priority";

export class CpuScheduler {
  private ready: ProcessDescriptor[] = [];

  private completed: ProcessDescriptor[] = [];

  private timeline: DispatchSlice[] = [];

  private time = 0;

  private readonly trace?: TraceSink;

  constructor(options: TraceOptions = {}) {
    this.trace = options.trace;
  }

  get clock(): number {
    return this.time;
  }

  admit(process: ProcessDescriptor): Outcome<ProcessDescriptor> {
    if (process.state !== "NEW" && process.state !== "READY") {
      return invalid(`${process.name} cannot be admitted from state ${process.state}`);
    }
    if (!isPositiveInt(process.burst_time)) {
      return invalid(`burst_time of ${process.name} must be a positive integer, got ${process.burst_time}`);
    }
    if (!isNonNegativeInt(process.remaining_time) || process.remaining_time > process.burst_time) {
      return invalid(
        `remaining_time of ${process.name} must be an integer in [0, ${process.burst_time}], got ${process.remaining_time}`,
      );
    }
    const known = [...this.ready, ...this.completed].some((entry) => entry.pid === process.pid);
    if (known) {
      return invalid(`pid ${process.pid} is already known to this scheduler`);
    }

    const admitted: ProcessDescriptor = { ...copyProcess(process), state: "READY" };
    this.ready.push(admitted);
    this.trace?.({ kind: "admit", t: this.time, pid: admitted.pid, name: admitted.name });
    return ok(copyProcess(admitted));
  }

  runFcfs(): Outcome<ScheduleRun> {
    return ok(this.runToCompletion("FCFS", "arrival_time"));
  }

  runSjf(): Outcome<ScheduleRun> {
    return ok(this.runToCompletion("SJF", "burst_time"));
  }

  runPriority(): Outcome<ScheduleRun> {
    return ok(this.runToCompletion("PRIORITY", "priority"));
  }

  runRoundRobin(quantum: number): Outcome<ScheduleRun> {
    if (!isPositiveInt(quantum)) {
      return invalid(`quantum must be a positive integer, got ${quantum}`);
    }

    const queue = this.ready;
    this.ready = [];
    const slices: DispatchSlice[] = [];
    const finished: ProcessDescriptor[] = [];

    while (queue.length > 0) {
      const process = queue.shift();
      if (!process) break;

      this.transition(process, "RUNNING");
      const slice = this.execute(process, Math.min(quantum, process.remaining_time));
      slices.push(slice);

      if (process.remaining_time > 0) {
        this.transition(process, "READY");
        queue.push(process);
        continue;
      }

      process.completion_time = this.time;
      process.turnaround_time = this.time - process.arrival_time;
      process.waiting_time = process.turnaround_time - process.burst_time;
      this.terminate(process, finished);
    }

    return ok({ algorithm: "RR", quantum, slices, completed: finished, clock: this.time });
  }

  run(algorithm: CpuAlgorithm, quantum?: number): Outcome<ScheduleRun> {
    if (algorithm === "FCFS") return this.runFcfs();
    if (algorithm === "SJF") return this.runSjf();
    if (algorithm === "PRIORITY") return this.runPriority();
    if (quantum === undefined) return invalid("RR requires a quantum");
    return this.runRoundRobin(quantum);
  }

  statistics(): Outcome<ScheduleStatistics> {
    return computeStatistics(this.completed, this.timeline, this.time);
  }

  snapshot(): SchedulerSnapshot {
    return {
      clock: this.time,
      ready: this.ready.map(copyProcess),
      completed: this.completed.map(copyProcess),
      gantt: this.timeline.map((slice) => ({ ...slice })),
    };
  }

  // The clock never waits for an arrival: a process dispatched before its
  // arrival_time ends up with a negative waiting_time.
  private runToCompletion(algorithm: CpuAlgorithm, key: OrderKey): ScheduleRun {
    // Array.prototype.sort is stable, so ties keep admission order.
    const order = [...this.ready].sort((a, b) => a[key] - b[key]);
    this.ready = [];
    const slices: DispatchSlice[] = [];
    const finished: ProcessDescriptor[] = [];

    for (const process of order) {
      this.transition(process, "RUNNING");
      process.waiting_time = this.time - process.arrival_time;
      slices.push(this.execute(process, process.remaining_time));
      process.completion_time = this.time;
      process.turnaround_time = this.time - process.arrival_time;
      this.terminate(process, finished);
    }

    return { algorithm, slices, completed: finished, clock: this.time };
  }

  private execute(process: ProcessDescriptor, duration: number): DispatchSlice {
    const start = this.time;
    this.trace?.({ kind: "dispatch", t: start, pid: process.pid, name: process.name, duration });
    this.time += duration;
    process.remaining_time -= duration;
    const slice = { pid: process.pid, name: process.name, start, end: this.time };
    this.timeline.push(slice);
    return { ...slice };
  }

  private terminate(process: ProcessDescriptor, finished: ProcessDescriptor[]) {
    this.transition(process, "TERMINATED");
    this.completed.push(process);
    finished.push(copyProcess(process));
  }

  private transition(process: ProcessDescriptor, to: ProcessState) {
    const from = process.state;
    process.state = to;
    this.trace?.({ kind: "transition", t: this.time, pid: process.pid, name: process.name, from, to });
  }
}
