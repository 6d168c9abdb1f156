import type { DiskAlgorithm, DiskResult, SeekMove } from "@/lib/disk/types";
import type { TraceSink } from "@/lib/trace/events";

export function walk(
  algorithm: DiskAlgorithm,
  head: number,
  sequence: number[],
  trace?: TraceSink,
): DiskResult {
  const moves: SeekMove[] = [];
  let current = head;
  let total = 0;

  for (const track of sequence) {
    const distance = Math.abs(track - current);
    moves.push({ from: current, to: track, distance });
    trace?.({ kind: "seek", from: current, to: track, distance });
    total += distance;
    current = track;
  }

  return { algorithm, head, sequence: [...sequence], moves, total_seek: total };
}

export function splitAround(requests: number[], head: number) {
  const ascending = (a: number, b: number) => a - b;
  return {
    left: requests.filter((track) => track < head).sort(ascending),
    right: requests.filter((track) => track >= head).sort(ascending),
  };
}
