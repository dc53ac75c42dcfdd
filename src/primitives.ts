/**
 * Sequential combinators: doForEach, doUntil, keepDoing, repeat.
 * Each runs ready steps in a plain loop and only suspends (attaches a continuation
 * and returns) when a step is still pending, so stack depth stays constant.
 */

import { Completion, futurize, type Future } from "./future.js";
import { rethrowIfViolation } from "./contract.js";
import {
  noteStep,
  noteSuspension,
  registerCombinator,
  settleCombinator,
} from "./debug.js";

/** Result of one {@link repeat} step: whether the loop should run again. */
export type StopIteration = "stop" | "continue";

function succeed(completion: Completion<void>, trace: number | undefined): void {
  settleCombinator(trace, "ready");
  completion.setValue();
}

function fail(completion: Completion<void>, error: unknown, trace: number | undefined): void {
  settleCombinator(trace, "failed");
  completion.setFailure(error);
}

/**
 * Runs `action` on each item in order, starting the next only after the previous
 * succeeded. Resolves once every item is done; the first failure ends the loop
 * and becomes the result, and later items are never started.
 *
 * @example
 * doForEach(chunks, (chunk) => writer.write(chunk));
 */
export function doForEach<T>(
  items: Iterable<T>,
  action: (item: T) => Future<void>,
): Future<void> {
  const completion = new Completion<void>();
  const result = completion.getFuture();
  const trace = registerCombinator("doForEach");
  let iterator: Iterator<T>;
  try {
    iterator = items[Symbol.iterator]();
  } catch (error) {
    rethrowIfViolation(error);
    fail(completion, error, trace);
    return result;
  }
  doForEachContinued(iterator, action, completion, trace);
  return result;
}

function doForEachContinued<T>(
  iterator: Iterator<T>,
  action: (item: T) => Future<void>,
  completion: Completion<void>,
  trace: number | undefined,
): void {
  for (;;) {
    let next: IteratorResult<T>;
    try {
      next = iterator.next();
    } catch (error) {
      rethrowIfViolation(error);
      fail(completion, error, trace);
      return;
    }
    if (next.done) {
      succeed(completion, trace);
      return;
    }
    const item = next.value;
    noteStep(trace);
    const step = futurize(() => action(item));
    if (!step.available) {
      noteSuspension(trace);
      step.onSettled((settled) => {
        if (settled.failed) fail(completion, settled.getFailure(), trace);
        else doForEachContinued(iterator, action, completion, trace);
      });
      return;
    }
    if (step.failed) {
      fail(completion, step.getFailure(), trace);
      return;
    }
  }
}

/**
 * Invokes `action` until it fails or `stop` returns true. `stop` is checked before
 * every invocation, so a condition that already holds resolves without running
 * the action.
 */
export function doUntil(stop: () => boolean, action: () => Future<void>): Future<void> {
  const completion = new Completion<void>();
  const result = completion.getFuture();
  doUntilContinued(stop, action, completion, registerCombinator("doUntil"));
  return result;
}

function doUntilContinued(
  stop: () => boolean,
  action: () => Future<void>,
  completion: Completion<void>,
  trace: number | undefined,
): void {
  for (;;) {
    let done: boolean;
    try {
      done = stop();
    } catch (error) {
      rethrowIfViolation(error);
      fail(completion, error, trace);
      return;
    }
    if (done) {
      succeed(completion, trace);
      return;
    }
    noteStep(trace);
    const step = futurize(action);
    if (!step.available) {
      noteSuspension(trace);
      step.onSettled((settled) => {
        if (settled.failed) fail(completion, settled.getFailure(), trace);
        else doUntilContinued(stop, action, completion, trace);
      });
      return;
    }
    if (step.failed) {
      fail(completion, step.getFailure(), trace);
      return;
    }
  }
}

/**
 * Invokes `action` until it fails. The returned future never resolves successfully;
 * it fails with the first failure.
 */
export function keepDoing(action: () => Future<void>): Future<void> {
  const completion = new Completion<void>();
  const result = completion.getFuture();
  doUntilContinued(() => false, action, completion, registerCombinator("keepDoing"));
  return result;
}

/**
 * Invokes `action` until it yields `"stop"` or fails.
 *
 * @example
 * repeat(() => reader.read().andThen((chunk) => (chunk === null ? "stop" : "continue")));
 */
export function repeat(action: () => Future<StopIteration>): Future<void> {
  const completion = new Completion<void>();
  const result = completion.getFuture();
  repeatContinued(action, completion, registerCombinator("repeat"));
  return result;
}

function repeatContinued(
  action: () => Future<StopIteration>,
  completion: Completion<void>,
  trace: number | undefined,
): void {
  for (;;) {
    noteStep(trace);
    const step = futurize(action);
    if (!step.available) {
      noteSuspension(trace);
      step.onSettled((settled) => {
        if (settled.failed) fail(completion, settled.getFailure(), trace);
        else if (settled.get() === "stop") succeed(completion, trace);
        else repeatContinued(action, completion, trace);
      });
      return;
    }
    if (step.failed) {
      fail(completion, step.getFailure(), trace);
      return;
    }
    if (step.get() === "stop") {
      succeed(completion, trace);
      return;
    }
  }
}
