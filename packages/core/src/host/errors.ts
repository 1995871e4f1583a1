import type { HandlerFault } from "../dispatch/types.js";

/** A system failed while being created or registered; the load was rolled back. */
export class SystemInstantiationError extends Error {
  readonly system: string;

  constructor(system: string, cause: Error) {
    super(`Failed to instantiate system "${system}": ${cause.message}`);
    this.name = "SystemInstantiationError";
    this.system = system;
    this.cause = cause;
  }
}

/**
 * The fault policy is `abort` and a system reached its fault limit.
 * `fault` is the one that ended the session; `faults` is every fault of
 * that cycle.
 */
export class HostAbortedError extends Error {
  readonly fault: HandlerFault;
  readonly faults: readonly HandlerFault[];

  constructor(fault: HandlerFault, faults: readonly HandlerFault[] = [fault]) {
    super(
      `Session aborted: system "${fault.system}" faulted handling "${fault.event}": ${fault.error.message}`,
    );
    this.name = "HostAbortedError";
    this.fault = fault;
    this.faults = faults;
    this.cause = fault.error;
  }
}

/** An operation was called in the wrong lifecycle phase. */
export class HostStateError extends Error {
  constructor(operation: string, status: string) {
    super(`Cannot ${operation}: host is ${status}.`);
    this.name = "HostStateError";
  }
}
