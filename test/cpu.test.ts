import { describe, expect, it } from "vitest";

import { createProcess, createProcesses, CpuScheduler, runCpuAlgorithm } from "@/lib/cpu";
import type { ProcessDescriptor, ProcessInput } from "@/lib/types";

const WORKLOAD: ProcessInput[] = [
  { pid: 1, name: "P1", priority: 1, burst_time: 5, arrival_time: 0 },
  { pid: 2, name: "P2", priority: 2, burst_time: 3, arrival_time: 1 },
  { pid: 3, name: "P3", priority: 1, burst_time: 8, arrival_time: 2 },
];

// P2 arrives long after P1 has finished.
const GAPPED: ProcessInput[] = [
  { pid: 1, burst_time: 2, arrival_time: 0 },
  { pid: 2, burst_time: 3, arrival_time: 10 },
];

function loaded(inputs: ProcessInput[] = WORKLOAD): CpuScheduler {
  const scheduler = new CpuScheduler();
  const created = createProcesses(inputs);
  if (!created.ok) throw new Error(created.error.message);
  for (const process of created.value) {
    const admitted = scheduler.admit(process);
    if (!admitted.ok) throw new Error(admitted.error.message);
  }
  return scheduler;
}

function timings(completed: ProcessDescriptor[]) {
  return completed.map((p) => [p.pid, p.waiting_time, p.turnaround_time, p.completion_time]);
}

describe("createProcess", () => {
  it("starts NEW with the full burst remaining", () => {
    const created = createProcess({ pid: 7, burst_time: 4 });
    expect(created.ok).toBe(true);
    if (!created.ok) return;
    expect(created.value).toMatchObject({
      pid: 7,
      name: "P7",
      priority: 0,
      arrival_time: 0,
      state: "NEW",
      remaining_time: 4,
      completion_time: null,
    });
  });

  it("rejects a non-positive burst", () => {
    const created = createProcess({ pid: 1, burst_time: 0 });
    expect(created.ok).toBe(false);
    if (created.ok) return;
    expect(created.error.kind).toBe("InvalidArgument");
  });
});

describe("CpuScheduler.admit", () => {
  it("copies the descriptor instead of mutating the caller's", () => {
    const created = createProcess({ pid: 1, burst_time: 2 });
    if (!created.ok) throw new Error("setup");
    const scheduler = new CpuScheduler();
    const admitted = scheduler.admit(created.value);
    expect(admitted.ok && admitted.value.state).toBe("READY");
    expect(created.value.state).toBe("NEW");
    expect(scheduler.clock).toBe(0);
  });

  it("refuses a burst that is not a positive integer", () => {
    const created = createProcess({ pid: 1, burst_time: 5 });
    if (!created.ok) throw new Error("setup");
    const admitted = new CpuScheduler().admit({ ...created.value, burst_time: 0, remaining_time: 0 });
    expect(!admitted.ok && admitted.error).toEqual({
      kind: "InvalidArgument",
      message: "burst_time of P1 must be a positive integer, got 0",
    });
  });

  it("refuses a remaining time outside [0, burst_time]", () => {
    const created = createProcess({ pid: 1, burst_time: 5 });
    if (!created.ok) throw new Error("setup");
    const scheduler = new CpuScheduler();

    const tooLong = scheduler.admit({ ...created.value, remaining_time: 99 });
    expect(!tooLong.ok && tooLong.error).toEqual({
      kind: "InvalidArgument",
      message: "remaining_time of P1 must be an integer in [0, 5], got 99",
    });
    expect(scheduler.admit({ ...created.value, remaining_time: -1 }).ok).toBe(false);
    expect(scheduler.admit({ ...created.value, remaining_time: 2.5 }).ok).toBe(false);
    expect(scheduler.snapshot().ready).toEqual([]);

    const preempted = scheduler.admit({ ...created.value, state: "READY", remaining_time: 3 });
    expect(preempted.ok && preempted.value.remaining_time).toBe(3);
  });

  it("refuses a terminated process and a duplicate pid", () => {
    const scheduler = loaded();
    const created = createProcess({ pid: 9, burst_time: 1 });
    if (!created.ok) throw new Error("setup");

    const terminated = scheduler.admit({ ...created.value, state: "TERMINATED" });
    expect(terminated.ok).toBe(false);

    const duplicate = scheduler.admit({ ...created.value, pid: 2 });
    expect(duplicate.ok).toBe(false);
    if (duplicate.ok) return;
    expect(duplicate.error.message).toBe("pid 2 is already known to this scheduler");
  });
});

describe("CpuScheduler.runFcfs", () => {
  it("runs in arrival order and computes waiting and turnaround", () => {
    const scheduler = loaded();
    const run = scheduler.runFcfs();
    expect(run.ok).toBe(true);
    if (!run.ok) return;

    expect(run.value.slices).toEqual([
      { pid: 1, name: "P1", start: 0, end: 5 },
      { pid: 2, name: "P2", start: 5, end: 8 },
      { pid: 3, name: "P3", start: 8, end: 16 },
    ]);
    expect(timings(run.value.completed)).toEqual([
      [1, 0, 5, 5],
      [2, 4, 7, 8],
      [3, 6, 14, 16],
    ]);
    expect(run.value.completed.every((p) => p.state === "TERMINATED" && p.remaining_time === 0)).toBe(true);
    expect(scheduler.snapshot().ready).toEqual([]);
  });

  it("keeps admission order for equal arrival times", () => {
    const scheduler = loaded([
      { pid: 2, burst_time: 1, arrival_time: 0 },
      { pid: 1, burst_time: 1, arrival_time: 0 },
      { pid: 3, burst_time: 1, arrival_time: 0 },
    ]);
    const run = scheduler.runFcfs();
    if (!run.ok) throw new Error(run.error.message);
    expect(run.value.completed.map((p) => p.pid)).toEqual([2, 1, 3]);
  });

  it("never idles: a late arrival runs early with negative waiting", () => {
    const scheduler = loaded(GAPPED);
    const run = scheduler.runFcfs();
    if (!run.ok) throw new Error(run.error.message);

    expect(timings(run.value.completed)).toEqual([
      [1, 0, 2, 2],
      [2, -8, -5, 5],
    ]);
    expect(scheduler.snapshot().gantt).toEqual([
      { pid: 1, name: "P1", start: 0, end: 2 },
      { pid: 2, name: "P2", start: 2, end: 5 },
    ]);

    const stats = scheduler.statistics();
    if (!stats.ok) throw new Error(stats.error.message);
    expect(stats.value.makespan).toBe(5);
    expect(stats.value.cpu_util).toBe(1);
  });

  it("keeps one timeline entry per dispatch however long the burst", () => {
    const scheduler = loaded([{ pid: 1, burst_time: 1_000_000_000 }]);
    scheduler.runFcfs();
    expect(scheduler.snapshot().gantt).toEqual([{ pid: 1, name: "P1", start: 0, end: 1_000_000_000 }]);

    const stats = scheduler.statistics();
    if (!stats.ok) throw new Error(stats.error.message);
    expect(stats.value.makespan).toBe(1_000_000_000);
    expect(stats.value.throughput).toBe(1 / 1_000_000_000);
  });
});

describe("CpuScheduler.runSjf", () => {
  it("orders by burst and ignores arrival times", () => {
    const scheduler = loaded();
    const run = scheduler.runSjf();
    if (!run.ok) throw new Error(run.error.message);

    expect(run.value.completed.map((p) => p.pid)).toEqual([2, 1, 3]);
    // P2 arrives at 1 but is dispatched at 0.
    expect(timings(run.value.completed)).toEqual([
      [2, -1, 2, 3],
      [1, 3, 8, 8],
      [3, 6, 14, 16],
    ]);
  });
});

describe("CpuScheduler.runPriority", () => {
  it("orders by priority, stable on ties", () => {
    const scheduler = loaded();
    const run = scheduler.runPriority();
    if (!run.ok) throw new Error(run.error.message);
    expect(run.value.slices.map((s) => [s.pid, s.start, s.end])).toEqual([
      [1, 0, 5],
      [3, 5, 13],
      [2, 13, 16],
    ]);
  });
});

describe("CpuScheduler.runRoundRobin", () => {
  it("rotates a FIFO queue with the given quantum", () => {
    const scheduler = loaded();
    const run = scheduler.runRoundRobin(2);
    if (!run.ok) throw new Error(run.error.message);

    expect(run.value.slices.map((s) => s.pid)).toEqual([1, 2, 3, 1, 2, 3, 1, 3, 3]);
    expect(run.value.slices.map((s) => s.start)).toEqual([0, 2, 4, 6, 8, 9, 11, 12, 14]);
    expect(timings(run.value.completed)).toEqual([
      [2, 5, 8, 9],
      [1, 7, 12, 12],
      [3, 6, 14, 16],
    ]);
  });

  it("satisfies waiting + burst = turnaround for every process", () => {
    const scheduler = loaded();
    const run = scheduler.runRoundRobin(3);
    if (!run.ok) throw new Error(run.error.message);
    for (const p of run.value.completed) {
      expect(p.waiting_time + p.burst_time).toBe(p.turnaround_time);
    }
  });

  it("matches FCFS when the quantum covers every burst", () => {
    const fcfs = loaded().runFcfs();
    const rr = loaded().runRoundRobin(8);
    if (!fcfs.ok || !rr.ok) throw new Error("run failed");
    expect(rr.value.slices).toEqual(fcfs.value.slices);
    expect(rr.value.completed).toEqual(fcfs.value.completed);
  });

  it("matches FCFS across an arrival gap", () => {
    const fcfs = loaded(GAPPED).runFcfs();
    const rr = loaded(GAPPED).runRoundRobin(5);
    if (!fcfs.ok || !rr.ok) throw new Error("run failed");
    expect(rr.value.slices).toEqual(fcfs.value.slices);
    expect(rr.value.completed).toEqual(fcfs.value.completed);
    expect(rr.value.clock).toBe(5);
  });

  it("rejects a non-positive or fractional quantum and leaves the queue alone", () => {
    const scheduler = loaded();
    for (const quantum of [0, -2, 1.5]) {
      const run = scheduler.runRoundRobin(quantum);
      expect(run.ok).toBe(false);
      if (run.ok) continue;
      expect(run.error.kind).toBe("InvalidArgument");
    }
    expect(scheduler.snapshot().ready).toHaveLength(3);
  });
});

describe("waiting + burst = turnaround", () => {
  const runs = {
    FCFS: (scheduler: CpuScheduler) => scheduler.runFcfs(),
    SJF: (scheduler: CpuScheduler) => scheduler.runSjf(),
    PRIORITY: (scheduler: CpuScheduler) => scheduler.runPriority(),
    RR: (scheduler: CpuScheduler) => scheduler.runRoundRobin(2),
  };

  for (const [algorithm, runWith] of Object.entries(runs)) {
    it(`holds in total for ${algorithm}`, () => {
      for (const inputs of [WORKLOAD, GAPPED]) {
        const run = runWith(loaded(inputs));
        if (!run.ok) throw new Error(run.error.message);
        const sum = (pick: (p: ProcessDescriptor) => number) =>
          run.value.completed.reduce((total, p) => total + pick(p), 0);
        expect(sum((p) => p.waiting_time) + sum((p) => p.burst_time)).toBe(sum((p) => p.turnaround_time));
      }
    });
  }

  it("holds for SJF even when a job is dispatched before it arrives", () => {
    const run = loaded().runSjf();
    if (!run.ok) throw new Error(run.error.message);
    expect(run.value.completed.some((p) => p.waiting_time < 0)).toBe(true);
    for (const p of run.value.completed) {
      expect(p.waiting_time + p.burst_time).toBe(p.turnaround_time);
    }
  });
});

describe("CpuScheduler.statistics", () => {
  it("fails with EmptyResult before anything completes", () => {
    const stats = loaded().statistics();
    expect(stats.ok).toBe(false);
    if (stats.ok) return;
    expect(stats.error.kind).toBe("EmptyResult");
  });

  it("averages waiting and turnaround over completed processes", () => {
    const scheduler = loaded();
    scheduler.runFcfs();
    const stats = scheduler.statistics();
    if (!stats.ok) throw new Error(stats.error.message);

    expect(stats.value.avg_wt).toBeCloseTo(10 / 3);
    expect(stats.value.avg_tat).toBeCloseTo(26 / 3);
    expect(stats.value.makespan).toBe(16);
    expect(stats.value.throughput).toBeCloseTo(3 / 16);
    expect(stats.value.cpu_util).toBe(1);
    expect(stats.value.per_process[1]).toEqual({ pid: 2, name: "P2", at: 1, bt: 3, ct: 8, wt: 4, tat: 7 });
  });
});

describe("runCpuAlgorithm", () => {
  it("falls back to the default quantum for RR", () => {
    const result = runCpuAlgorithm("RR", WORKLOAD);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.run.quantum).toBe(2);
    expect(result.value.run.slices).toHaveLength(9);
  });

  it("leaves CpuScheduler.run without a quantum invalid for RR", () => {
    const run = loaded().run("RR");
    expect(!run.ok && run.error.message).toBe("RR requires a quantum");
  });

  it("returns the run with its statistics", () => {
    const result = runCpuAlgorithm("RR", WORKLOAD, { quantum: 2 });
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.run.quantum).toBe(2);
    expect(result.value.statistics.avg_wt).toBeCloseTo(6);
  });
});
