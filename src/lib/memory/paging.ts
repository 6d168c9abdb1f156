import { DEFAULT_CONFIG } from "@/lib/config";
import type { Translation } from "@/lib/memory/types";
import { fail, invalid, isNonNegativeInt, isPositiveInt, ok, type Outcome } from "@/lib/result";

export class PageTable {
  private readonly table = new Map<number, number>();

  private constructor(readonly pageSize: number) {}

  static create(pageSize = DEFAULT_CONFIG.pageSize): Outcome<PageTable> {
    if (!isPositiveInt(pageSize)) {
      return invalid(`page size must be a positive integer, got ${pageSize}`);
    }
    return ok(new PageTable(pageSize));
  }

  map(page: number, frame: number): Outcome<void> {
    if (!isNonNegativeInt(page)) return invalid(`page must be a non-negative integer, got ${page}`);
    if (!isNonNegativeInt(frame)) return invalid(`frame must be a non-negative integer, got ${frame}`);
    this.table.set(page, frame);
    return ok(undefined);
  }

  unmap(page: number): Outcome<number> {
    const frame = this.table.get(page);
    if (frame === undefined) return fail("NotFound", `page ${page} is not mapped`);
    this.table.delete(page);
    return ok(frame);
  }

  // An unmapped page is a fault, which is a normal translation outcome.
  translate(logical: number): Outcome<Translation> {
    if (!isNonNegativeInt(logical)) {
      return invalid(`logical address must be a non-negative integer, got ${logical}`);
    }
    const page = Math.floor(logical / this.pageSize);
    const offset = logical % this.pageSize;
    const frame = this.table.get(page);
    if (frame === undefined) {
      return ok({ hit: false, logical, page, offset });
    }
    return ok({ hit: true, logical, page, offset, frame, physical: frame * this.pageSize + offset });
  }

  entries(): Array<[page: number, frame: number]> {
    return [...this.table.entries()].sort((a, b) => a[0] - b[0]);
  }
}
