import { invalid, isNonNegativeInt, isPositiveInt, ok, type Outcome } from "@/lib/result";
import type { ProcessDescriptor, ProcessInput } from "@/lib/types";

export function createProcess(input: ProcessInput): Outcome<ProcessDescriptor> {
  const arrival = input.arrival_time ?? 0;
  const priority = input.priority ?? 0;

  if (!Number.isInteger(input.pid)) return invalid(`pid must be an integer, got ${input.pid}`);
  if (!isPositiveInt(input.burst_time)) {
    return invalid(`burst_time of P${input.pid} must be a positive integer, got ${input.burst_time}`);
  }
  if (!isNonNegativeInt(arrival)) {
    return invalid(`arrival_time of P${input.pid} must be a non-negative integer, got ${arrival}`);
  }
  if (!Number.isInteger(priority)) {
    return invalid(`priority of P${input.pid} must be an integer, got ${priority}`);
  }

  const name = input.name?.trim() || `P${input.pid}`;
  return ok({
    pid: input.pid,
    name,
    priority,
    burst_time: input.burst_time,
    arrival_time: arrival,
    state: "NEW",
    waiting_time: 0,
    turnaround_time: 0,
    remaining_time: input.burst_time,
    completion_time: null,
  });
}

export function createProcesses(inputs: ProcessInput[]): Outcome<ProcessDescriptor[]> {
  const out: ProcessDescriptor[] = [];
  for (const input of inputs) {
    const created = createProcess(input);
    if (!created.ok) return created;
    out.push(created.value);
  }
  return ok(out);
}

export function copyProcess(process: ProcessDescriptor): ProcessDescriptor {
  return { ...process };
}
