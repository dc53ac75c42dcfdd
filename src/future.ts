/**
 * Future and Completion – a single-assignment async value that can be queried
 * synchronously, paired with its one-shot writer. Awaitable but not a Promise.
 */

import { contractViolation, rethrowIfViolation } from "./contract.js";
import { schedule } from "./scheduler.js";

/** Lifecycle state of a Future: pending, then ready or failed for good. */
export type FutureStatus = "pending" | "ready" | "failed";

/** Terminal outcome handed to a continuation. */
export type Outcome<T> =
  | { status: "ready"; value: T }
  | { status: "failed"; error: unknown };

type FutureState<T> = { status: "pending" } | Outcome<T>;

type Continuation<T> = (outcome: Outcome<T>) => void;

/**
 * Storage shared by a Future and the Completion that settles it.
 * @internal
 */
export interface FutureCell<T> {
  state: FutureState<T>;
  continuation?(outcome: Outcome<T>): void;
}

/**
 * Deferred result of one operation. Holds at most one continuation: attaching one
 * (`andThen`, `thenWrapped`, `onSettled`, `forwardTo`, `await`) or reading the outcome
 * (`get`, `getFailure`) consumes the future, and any later use is a contract violation.
 *
 * A continuation attached to a terminal future runs inline; one attached to a pending
 * future is handed to the scheduler when the future settles.
 */
export class Future<T> implements PromiseLike<T> {
  readonly #cell: FutureCell<T>;
  #consumed = false;

  /** @internal Use {@link Completion.getFuture}, {@link makeReadyFuture} or {@link makeFailedFuture}. */
  constructor(cell: FutureCell<T>) {
    this.#cell = cell;
  }

  get status(): FutureStatus {
    if (this.#consumed) contractViolation("Future queried after it was consumed");
    return this.#cell.state.status;
  }

  /** True once the future is ready or failed. */
  get available(): boolean {
    return this.status !== "pending";
  }

  get failed(): boolean {
    return this.status === "failed";
  }

  /** Returns the value or throws the failure. Consumes the future; it must not be pending. */
  get(): T {
    const outcome = this.#take("get()");
    if (outcome.status === "failed") throw outcome.error;
    return outcome.value;
  }

  /** Returns the failure payload. Consumes the future; it must be failed. */
  getFailure(): unknown {
    const outcome = this.#take("getFailure()");
    if (outcome.status === "ready") {
      contractViolation("Future.getFailure() called on a ready future");
    }
    return outcome.error;
  }

  /**
   * Runs `fn` with the value once ready; a failure skips `fn` and passes through.
   * When `fn` returns a Future the result waits on it. A throwing `fn` fails the result.
   */
  andThen<R>(fn: (value: T) => Future<R>): Future<R>;
  andThen<R>(fn: (value: T) => R): Future<R>;
  andThen<R>(fn: (value: T) => R | Future<R>): Future<R> {
    const completion = new Completion<R>();
    const result = completion.getFuture();
    this.#attach((outcome) => {
      if (outcome.status === "failed") {
        completion.setFailure(outcome.error);
        return;
      }
      settleWith(completion, () => fn(outcome.value));
    });
    return result;
  }

  /**
   * Runs `fn` with this future once it is terminal, whatever the outcome. `fn` receives
   * a fresh terminal future it owns; return it (or another future) to pass the outcome on.
   */
  thenWrapped<R>(fn: (settled: Future<T>) => Future<R>): Future<R>;
  thenWrapped<R>(fn: (settled: Future<T>) => R): Future<R>;
  thenWrapped<R>(fn: (settled: Future<T>) => R | Future<R>): Future<R> {
    const completion = new Completion<R>();
    const result = completion.getFuture();
    this.#attach((outcome) => {
      settleWith(completion, () => fn(terminal(outcome)));
    });
    return result;
  }

  /** Recovers from a failure with `fn`; a ready value passes through untouched. */
  handleException(fn: (error: unknown) => T | Future<T>): Future<T> {
    const completion = new Completion<T>();
    const result = completion.getFuture();
    this.#attach((outcome) => {
      if (outcome.status === "ready") {
        completion.setValue(outcome.value);
        return;
      }
      settleWith(completion, () => fn(outcome.error));
    });
    return result;
  }

  /**
   * Attaches a terminal continuation that produces nothing. Used where the caller
   * routes the outcome itself (e.g. into a Completion it owns).
   */
  onSettled(fn: (settled: Future<T>) => void): void {
    this.#attach((outcome) => fn(terminal(outcome)));
  }

  /** Moves this future's outcome into `completion` once it is terminal. */
  forwardTo(completion: Completion<T>): void {
    this.#attach((outcome) => {
      if (outcome.status === "ready") completion.setValue(outcome.value);
      else completion.setFailure(outcome.error);
    });
  }

  then<TResult1 = T, TResult2 = never>(
    onFulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): PromiseLike<TResult1 | TResult2> {
    let resolve!: (value: T) => void;
    let reject!: (reason: unknown) => void;
    const promise = new Promise<T>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.#attach((outcome) => {
      if (outcome.status === "ready") resolve(outcome.value);
      else reject(outcome.error);
    });
    return promise.then(onFulfilled, onRejected);
  }

  #take(operation: string): Outcome<T> {
    if (this.#consumed) contractViolation(`Future.${operation} called after it was consumed`);
    const state = this.#cell.state;
    if (state.status === "pending") {
      contractViolation(`Future.${operation} called on a pending future`);
    }
    this.#consumed = true;
    return state;
  }

  #attach(continuation: Continuation<T>): void {
    if (this.#consumed) {
      contractViolation("continuation attached to a Future that was already consumed");
    }
    this.#consumed = true;
    const state = this.#cell.state;
    if (state.status === "pending") {
      this.#cell.continuation = continuation;
      return;
    }
    continuation(state);
  }
}

/**
 * Writable side of a Future. Hands out its future once and settles it once; both
 * rules are enforced with {@link contractViolation}.
 */
export class Completion<T> {
  readonly #cell: FutureCell<T> = { state: { status: "pending" } };
  #futureTaken = false;
  #settled = false;

  get settled(): boolean {
    return this.#settled;
  }

  /** Returns the paired future. May be called once. */
  getFuture(): Future<T> {
    if (this.#futureTaken) contractViolation("Completion.getFuture() called twice");
    this.#futureTaken = true;
    return new Future(this.#cell);
  }

  setValue(value: T): void {
    this.#settle({ status: "ready", value });
  }

  setFailure(error: unknown): void {
    this.#settle({ status: "failed", error });
  }

  #settle(outcome: Outcome<T>): void {
    if (this.#settled) contractViolation("Completion settled twice");
    this.#settled = true;
    this.#cell.state = outcome;
    const continuation = this.#cell.continuation;
    if (continuation) {
      this.#cell.continuation = undefined;
      schedule(() => continuation(outcome));
    }
  }
}

function terminal<T>(outcome: Outcome<T>): Future<T> {
  return new Future({ state: outcome });
}

function settleWith<R>(completion: Completion<R>, fn: () => R | Future<R>): void {
  let out: R | Future<R>;
  try {
    out = fn();
  } catch (error) {
    rethrowIfViolation(error);
    completion.setFailure(error);
    return;
  }
  if (isFuture(out)) out.forwardTo(completion);
  else completion.setValue(out);
}

export function isFuture<T>(value: T | Future<T>): value is Future<T> {
  return value instanceof Future;
}

/** Returns an already-ready future. `makeReadyFuture()` yields `Future<void>`. */
export function makeReadyFuture(): Future<void>;
export function makeReadyFuture<T>(value: T): Future<T>;
export function makeReadyFuture<T>(value?: T): Future<T | undefined> {
  return new Future<T | undefined>({ state: { status: "ready", value } });
}

export function makeFailedFuture<T = void>(error: unknown): Future<T> {
  return new Future<T>({ state: { status: "failed", error } });
}

/**
 * Calls `fn`, turning a synchronous throw into a failed future so callers see every
 * failure through the returned future. Contract violations still throw.
 */
export function futurize<T>(fn: () => Future<T>): Future<T> {
  try {
    return fn();
  } catch (error) {
    rethrowIfViolation(error);
    return makeFailedFuture<T>(error);
  }
}
