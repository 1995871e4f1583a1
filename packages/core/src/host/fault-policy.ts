/**
 * What the host does with a system once it has faulted `maxFaults` times:
 * - `ignore`: keep dispatching to it
 * - `evict-system`: skip its handlers and cut off its capabilities
 * - `evict-plugin`: the same for every system of its module
 * - `abort`: tear the whole session down
 */
export const FAULT_ACTIONS = [
  "ignore",
  "evict-system",
  "evict-plugin",
  "abort",
] as const;
export type FaultAction = (typeof FAULT_ACTIONS)[number];

export interface FaultPolicy {
  action: FaultAction;
  /** Faults tolerated per system before `action` applies. */
  maxFaults: number;
}

export const DEFAULT_FAULT_POLICY: Readonly<FaultPolicy> = {
  action: "evict-system",
  maxFaults: 1,
};

export function resolveFaultPolicy(policy?: Partial<FaultPolicy>): FaultPolicy {
  const resolved = { ...DEFAULT_FAULT_POLICY, ...policy };
  if (!Number.isInteger(resolved.maxFaults) || resolved.maxFaults < 1) {
    throw new RangeError(
      `maxFaults must be a positive integer, got ${resolved.maxFaults}.`,
    );
  }
  return resolved;
}
