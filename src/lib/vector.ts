import { invalid, isNonNegativeInt, ok, type Outcome } from "@/lib/result";

export type ResourceVector = number[];

export type ResourceMatrix = ResourceVector[];

export function cloneVector(v: ResourceVector): ResourceVector {
  return [...v];
}

export function cloneMatrix(m: ResourceMatrix): ResourceMatrix {
  return m.map((row) => [...row]);
}

function assertSameWidth(a: ResourceVector, b: ResourceVector) {
  if (a.length !== b.length) {
    throw new Error(`Vector width mismatch: ${a.length} vs ${b.length}`);
  }
}

export function addVectors(a: ResourceVector, b: ResourceVector): ResourceVector {
  assertSameWidth(a, b);
  return a.map((value, r) => value + b[r]);
}

export function subVectors(a: ResourceVector, b: ResourceVector): ResourceVector {
  assertSameWidth(a, b);
  return a.map((value, r) => value - b[r]);
}

// Component-wise a[r] <= b[r].
export function fitsWithin(a: ResourceVector, b: ResourceVector): boolean {
  assertSameWidth(a, b);
  return a.every((value, r) => value <= b[r]);
}

export function validateVector(v: ResourceVector, width: number, label: string): Outcome<ResourceVector> {
  if (v.length !== width) {
    return invalid(`${label} has ${v.length} entries, expected ${width}`);
  }
  const badIndex = v.findIndex((value) => !isNonNegativeInt(value));
  if (badIndex >= 0) {
    return invalid(`${label}[${badIndex}] must be a non-negative integer, got ${v[badIndex]}`);
  }
  return ok(cloneVector(v));
}

export function validateMatrix(
  m: ResourceMatrix,
  rows: number,
  width: number,
  label: string,
): Outcome<ResourceMatrix> {
  if (m.length !== rows) {
    return invalid(`${label} has ${m.length} rows, expected ${rows}`);
  }
  const out: ResourceMatrix = [];
  for (const [p, row] of m.entries()) {
    const checked = validateVector(row, width, `${label}[${p}]`);
    if (!checked.ok) return checked;
    out.push(checked.value);
  }
  return ok(out);
}
