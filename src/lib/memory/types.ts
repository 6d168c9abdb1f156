export type PlacementPolicy = "FIRST" | "BEST" | "WORST";

export type Extent = {
  start: number;
  size: number;
  free: boolean;
  pid: number | null;
};

export type Allocation = {
  pid: number;
  address: number;
  size: number;
};

export type MemoryStats = {
  total: number;
  used: number;
  free: number;
  largestFree: number;
  freeExtents: number;
  fragmentation: number;
};

export type Translation =
  | { hit: true; logical: number; page: number; offset: number; frame: number; physical: number }
  | { hit: false; logical: number; page: number; offset: number };
