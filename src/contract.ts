/**
 * Handle contract checks – misuse of a Future or Completion (double attach,
 * query after consume, double settle) is fatal and always throws.
 */

let onViolationCallback: ((message: string) => void) | undefined;

/**
 * Error thrown when a Future or Completion is used against its ownership contract:
 * a consumed future queried or attached to again, a completion settled twice, or
 * its future handed out twice.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
    Object.setPrototypeOf(this, ContractViolationError.prototype);
  }
}

/**
 * Options for {@link onContractViolation}. `onViolation` is called with the message
 * before the library throws, so tests or loggers can capture the violation.
 */
export type ContractViolationOptions = {
  /** Called with the violation message before the library throws. */
  onViolation?: (message: string) => void;
};

/**
 * Registers a process-wide observer for contract violations. The violation still
 * throws {@link ContractViolationError}; the observer only sees the message first.
 * Call once at startup or in tests.
 */
export function onContractViolation(options?: ContractViolationOptions): void {
  onViolationCallback = options?.onViolation;
}

/** Internal use for tests only; not part of public API. */
export function resetContractViolationHandler(): void {
  onViolationCallback = undefined;
}

/**
 * Reports the violation to the registered observer, then throws {@link ContractViolationError}.
 * @internal
 */
export function contractViolation(message: string): never {
  onViolationCallback?.(message);
  throw new ContractViolationError(message);
}

/**
 * Lets a contract violation escape a catch that turns user errors into failed futures.
 * @internal
 */
export function rethrowIfViolation(error: unknown): void {
  if (error instanceof ContractViolationError) throw error;
}
