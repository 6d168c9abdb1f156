export * from "@/lib/deadlock/types";
export { computeNeed, detectDeadlock, evaluateRequest, validateBankerState } from "@/lib/deadlock/banker";
