import type { ResourceMatrix, ResourceVector } from "@/lib/vector";

export type BankerState = {
  allocation: ResourceMatrix;
  max_need: ResourceMatrix;
  available: ResourceVector;
};

export type SafetyVerdict =
  | {
      status: "SAFE";
      sequence: number[];
      need: ResourceMatrix;
      work: ResourceVector;
    }
  | {
      status: "UNSAFE";
      sequence: number[];
      deadlocked: number[];
      need: ResourceMatrix;
      work: ResourceVector;
    };

export type RequestDecision =
  | { status: "GRANTED"; state: BankerState; sequence: number[] }
  | { status: "DENIED_UNAVAILABLE"; shortfall: ResourceVector }
  | { status: "DENIED_UNSAFE"; deadlocked: number[] };
