import { invalid, isNonNegativeInt, ok, type Outcome } from "@/lib/result";
import type { TraceOptions, TraceSink } from "@/lib/trace/events";

type Waiter = {
  holder: string;
  resume: () => void;
};

export class Semaphore {
  private count: number;

  private readonly queue: Waiter[] = [];

  private readonly trace?: TraceSink;

  private constructor(initial: number, options: TraceOptions) {
    this.count = initial;
    this.trace = options.trace;
  }

  static create(initial: number = 1, options: TraceOptions = {}): Outcome<Semaphore> {
    if (!isNonNegativeInt(initial)) {
      return invalid(`initial semaphore value must be a non-negative integer, got ${initial}`);
    }
    return ok(new Semaphore(initial, options));
  }

  get value(): number {
    return this.count;
  }

  get waiting(): string[] {
    return this.queue.map((waiter) => waiter.holder);
  }

  tryAcquire(holder: string): boolean {
    if (this.count <= 0) return false;
    this.count -= 1;
    this.trace?.({ kind: "acquire", holder, value: this.count });
    return true;
  }

  // Suspends until a release hands the permit over; waiters resume in FIFO order.
  acquire(holder: string): Promise<void> {
    if (this.tryAcquire(holder)) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.queue.push({ holder, resume: resolve });
      this.trace?.({ kind: "block", holder, queued: this.queue.length });
    });
  }

  release(holder: string): string | null {
    const next = this.queue.shift();
    if (!next) {
      this.count += 1;
      this.trace?.({ kind: "release", holder, value: this.count });
      return null;
    }
    this.trace?.({ kind: "release", holder, value: this.count });
    this.trace?.({ kind: "wake", holder: next.holder });
    next.resume();
    return next.holder;
  }
}
