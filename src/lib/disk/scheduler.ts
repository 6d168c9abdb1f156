import { DEFAULT_CONFIG } from "@/lib/config";
import { fcfsOrder } from "@/lib/disk/fcfs";
import { cscanOrder, scanOrder } from "@/lib/disk/scan";
import { walk } from "@/lib/disk/seek";
import { sstfOrder } from "@/lib/disk/sstf";
import type { DiskAlgorithm, DiskBatch, DiskResult, SweepDirection } from "@/lib/disk/types";
import { invalid, isPositiveInt, ok, type Outcome } from "@/lib/result";
import type { TraceOptions, TraceSink } from "@/lib/trace/events";

const DIRECTIONS: readonly string[] = ["up", "down"];

function isDirection(value: string): value is SweepDirection {
  return DIRECTIONS.includes(value);
}

export class DiskScheduler {
  private readonly trace?: TraceSink;

  private constructor(readonly totalCylinders: number, options: TraceOptions) {
    this.trace = options.trace;
  }

  static create(
    totalCylinders = DEFAULT_CONFIG.totalCylinders,
    options: TraceOptions = {},
  ): Outcome<DiskScheduler> {
    if (!isPositiveInt(totalCylinders)) {
      return invalid(`cylinder count must be a positive integer, got ${totalCylinders}`);
    }
    return ok(new DiskScheduler(totalCylinders, options));
  }

  get lastTrack(): number {
    return this.totalCylinders - 1;
  }

  fcfs(requests: number[], head: number): Outcome<DiskResult> {
    const bad = this.checkTracks(requests, head);
    if (bad) return bad;
    return ok(walk("FCFS", head, fcfsOrder(requests), this.trace));
  }

  sstf(requests: number[], head: number): Outcome<DiskResult> {
    const bad = this.checkTracks(requests, head);
    if (bad) return bad;
    return ok(walk("SSTF", head, sstfOrder(requests, head), this.trace));
  }

  scan(requests: number[], head: number, direction: string): Outcome<DiskResult> {
    const bad = this.checkTracks(requests, head);
    if (bad) return bad;
    if (!isDirection(direction)) return invalid(`unknown sweep direction "${direction}"`);
    return ok(walk("SCAN", head, scanOrder(requests, head, direction, this.lastTrack), this.trace));
  }

  cscan(requests: number[], head: number, direction: string): Outcome<DiskResult> {
    const bad = this.checkTracks(requests, head);
    if (bad) return bad;
    if (!isDirection(direction)) return invalid(`unknown sweep direction "${direction}"`);
    return ok(walk("CSCAN", head, cscanOrder(requests, head, direction, this.lastTrack), this.trace));
  }

  run(algorithm: DiskAlgorithm, batch: DiskBatch): Outcome<DiskResult> {
    if (algorithm === "FCFS") return this.fcfs(batch.requests, batch.head);
    if (algorithm === "SSTF") return this.sstf(batch.requests, batch.head);
    if (batch.direction === undefined) return invalid(`${algorithm} requires a sweep direction`);
    if (algorithm === "SCAN") return this.scan(batch.requests, batch.head, batch.direction);
    return this.cscan(batch.requests, batch.head, batch.direction);
  }

  private checkTracks(requests: number[], head: number): Outcome<never> | null {
    const inRange = (track: number) => Number.isInteger(track) && track >= 0 && track < this.totalCylinders;
    if (!inRange(head)) {
      return invalid(`head ${head} is outside [0, ${this.totalCylinders})`);
    }
    const badTrack = requests.find((track) => !inRange(track));
    if (badTrack !== undefined) {
      return invalid(`track ${badTrack} is outside [0, ${this.totalCylinders})`);
    }
    return null;
  }
}
