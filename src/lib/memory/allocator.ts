import { DEFAULT_CONFIG } from "@/lib/config";
import { selectExtent } from "@/lib/memory/placement";
import type { Allocation, Extent, MemoryStats, PlacementPolicy } from "@/lib/memory/types";
import { fail, invalid, isPositiveInt, ok, type Outcome } from "@/lib/result";
import type { TraceOptions, TraceSink } from "@/lib/trace/events";

export type AllocatorOptions = TraceOptions & {
  placement?: PlacementPolicy;
};

const PLACEMENTS: PlacementPolicy[] = ["FIRST", "BEST", "WORST"];

export class MemoryAllocator {
  private extents: Extent[];

  private readonly total: number;

  private readonly placement: PlacementPolicy;

  private readonly trace?: TraceSink;

  private constructor(total: number, placement: PlacementPolicy, trace?: TraceSink) {
    this.total = total;
    this.placement = placement;
    this.trace = trace;
    this.extents = [{ start: 0, size: total, free: true, pid: null }];
  }

  static create(
    totalMemory = DEFAULT_CONFIG.totalMemory,
    options: AllocatorOptions = {},
  ): Outcome<MemoryAllocator> {
    if (!isPositiveInt(totalMemory)) {
      return invalid(`total memory must be a positive integer, got ${totalMemory}`);
    }
    const placement = options.placement ?? DEFAULT_CONFIG.placement;
    if (!PLACEMENTS.includes(placement)) {
      return invalid(`unknown placement policy ${String(placement)}`);
    }
    return ok(new MemoryAllocator(totalMemory, placement, options.trace));
  }

  get totalMemory(): number {
    return this.total;
  }

  get policy(): PlacementPolicy {
    return this.placement;
  }

  allocate(pid: number, size: number): Outcome<Allocation> {
    if (!Number.isInteger(pid)) return invalid(`pid must be an integer, got ${pid}`);
    if (!isPositiveInt(size)) return invalid(`allocation size must be a positive integer, got ${size}`);
    if (this.extents.some((extent) => !extent.free && extent.pid === pid)) {
      return invalid(`P${pid} already owns an extent`);
    }

    const index = selectExtent(this.extents, size, this.placement);
    if (index < 0) {
      return fail(
        "InsufficientMemory",
        `no free extent of ${size} for P${pid} (largest free is ${this.largestFree()})`,
      );
    }

    const target = this.extents[index];
    const remainder = target.size - size;
    const carved: Extent[] = [{ start: target.start, size, free: false, pid }];
    if (remainder > 0) {
      carved.push({ start: target.start + size, size: remainder, free: true, pid: null });
      this.trace?.({ kind: "split", address: target.start, size, remainder });
    }

    this.extents = [...this.extents.slice(0, index), ...carved, ...this.extents.slice(index + 1)];
    this.trace?.({ kind: "allocate", pid, address: target.start, size });
    return ok({ pid, address: target.start, size });
  }

  deallocate(pid: number): Outcome<Allocation> {
    const index = this.extents.findIndex((extent) => !extent.free && extent.pid === pid);
    if (index < 0) {
      return fail("NotFound", `P${pid} owns no extent`);
    }

    const owned = this.extents[index];
    this.extents = this.extents.map((extent, at) =>
      at === index ? { ...extent, free: true, pid: null } : extent,
    );
    this.trace?.({ kind: "free", pid, address: owned.start, size: owned.size });
    this.coalesce();
    return ok({ pid, address: owned.start, size: owned.size });
  }

  // Returns the number of extents absorbed into a free neighbour.
  coalesce(): number {
    const merged: Extent[] = [];
    const absorbed: number[] = [];

    for (const extent of this.extents) {
      const last = merged.at(-1);
      if (last && last.free && extent.free) {
        merged[merged.length - 1] = { ...last, size: last.size + extent.size };
        absorbed[absorbed.length - 1] += 1;
        continue;
      }
      merged.push({ ...extent });
      absorbed.push(0);
    }

    merged.forEach((extent, index) => {
      if (absorbed[index] > 0) {
        this.trace?.({ kind: "merge", address: extent.start, size: extent.size, absorbed: absorbed[index] });
      }
    });

    this.extents = merged;
    return absorbed.reduce((sum, count) => sum + count, 0);
  }

  snapshot(): Extent[] {
    return this.extents.map((extent) => ({ ...extent }));
  }

  stats(): MemoryStats {
    const free = this.extents.filter((extent) => extent.free).reduce((sum, extent) => sum + extent.size, 0);
    const largestFree = this.largestFree();
    return {
      total: this.total,
      used: this.total - free,
      free,
      largestFree,
      freeExtents: this.extents.filter((extent) => extent.free).length,
      fragmentation: free > 0 ? 1 - largestFree / free : 0,
    };
  }

  private largestFree(): number {
    return this.extents.reduce((best, extent) => (extent.free && extent.size > best ? extent.size : best), 0);
  }
}
