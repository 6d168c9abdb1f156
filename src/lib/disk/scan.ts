import { splitAround } from "@/lib/disk/seek";
import type { SweepDirection } from "@/lib/disk/types";

// Full sweep: the head always travels to the edge before reversing.
export function scanOrder(requests: number[], head: number, direction: SweepDirection, lastTrack: number): number[] {
  const { left, right } = splitAround(requests, head);
  if (direction === "up") {
    return [...right, lastTrack, ...[...left].reverse()];
  }
  return [...[...left].reverse(), 0, ...right];
}

// Circular sweep: after the edge the head jumps to the opposite edge and keeps going.
export function cscanOrder(requests: number[], head: number, direction: SweepDirection, lastTrack: number): number[] {
  const { left, right } = splitAround(requests, head);
  if (direction === "up") {
    return [...right, lastTrack, 0, ...left];
  }
  return [...[...left].reverse(), 0, lastTrack, ...[...right].reverse()];
}
