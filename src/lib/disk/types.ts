export type DiskAlgorithm = "FCFS" | "SSTF" | "SCAN" | "CSCAN";
export type SweepDirection = "up" | "down";

export type DiskBatch = {
  requests: number[];
  head: number;
  direction?: SweepDirection;
};

export type SeekMove = {
  from: number;
  to: number;
  distance: number;
};

export type DiskResult = {
  algorithm: DiskAlgorithm;
  head: number;
  sequence: number[];
  moves: SeekMove[];
  total_seek: number;
};
