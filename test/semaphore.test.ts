import { describe, expect, it } from "vitest";

import { Semaphore } from "@/lib/sync/semaphore";
import { createTraceStore, traceSink } from "@/lib/trace/traceStore";

function semaphore(initial: number, store = createTraceStore()): Semaphore {
  const created = Semaphore.create(initial, { trace: traceSink(store) });
  if (!created.ok) throw new Error(created.error.message);
  return created.value;
}

describe("Semaphore", () => {
  it("rejects a negative initial value", () => {
    expect(Semaphore.create(-1).ok).toBe(false);
  });

  it("hands the permit straight to the next waiter", async () => {
    const store = createTraceStore();
    const sem = semaphore(1, store);

    await sem.acquire("A");
    const waitingB = sem.acquire("B");
    expect(sem.value).toBe(0);
    expect(sem.waiting).toEqual(["B"]);

    expect(sem.release("A")).toBe("B");
    await waitingB;
    expect(sem.value).toBe(0);

    expect(sem.release("B")).toBeNull();
    expect(sem.value).toBe(1);
    expect(store.getState().lines).toEqual([
      "sem: A acquired (value 0)",
      "sem: B waiting (1 queued)",
      "sem: A released (value 0)",
      "sem: B woken",
      "sem: B released (value 1)",
    ]);
  });

  it("wakes waiters in FIFO order", async () => {
    const sem = semaphore(0);
    const order: string[] = [];
    const first = sem.acquire("A").then(() => order.push("A"));
    const second = sem.acquire("B").then(() => order.push("B"));

    expect(sem.release("X")).toBe("A");
    expect(sem.release("X")).toBe("B");
    await Promise.all([first, second]);
    expect(order).toEqual(["A", "B"]);
  });

  it("does not block on tryAcquire", () => {
    const sem = semaphore(0);
    expect(sem.tryAcquire("A")).toBe(false);
    expect(sem.waiting).toEqual([]);
  });
});
