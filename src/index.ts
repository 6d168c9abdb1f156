export * from "@/lib/types";
export * from "@/lib/result";
export * from "@/lib/vector";
export * from "@/lib/config";
export * from "@/lib/trace/events";
export { createTraceStore, linesUpTo, traceSink, type TraceState, type TraceStore } from "@/lib/trace/traceStore";
export * from "@/lib/cpu";
export * from "@/lib/memory";
export * from "@/lib/deadlock";
export * from "@/lib/disk";
export { Semaphore } from "@/lib/sync/semaphore";
export { createRandom, generateWorkload, type WorkloadSpec } from "@/lib/workload/generate";
export { extractWorkloadProfile, type WorkloadProfile } from "@/lib/workload/profile";
export * from "@/lib/compare";
