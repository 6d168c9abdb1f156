import type { Extent, PlacementPolicy } from "@/lib/memory/types";

// Index of the extent to carve `size` from, or -1. Ties go to the lowest address.
export function selectExtent(extents: Extent[], size: number, policy: PlacementPolicy): number {
  let chosen = -1;

  for (let index = 0; index < extents.length; index += 1) {
    const extent = extents[index];
    if (!extent.free || extent.size < size) continue;
    if (policy === "FIRST") return index;
    if (chosen < 0) {
      chosen = index;
      continue;
    }
    const best = extents[chosen].size;
    if (policy === "BEST" && extent.size < best) chosen = index;
    if (policy === "WORST" && extent.size > best) chosen = index;
  }

  return chosen;
}
