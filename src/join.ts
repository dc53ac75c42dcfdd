/**
 * Join combinators: parallelForEach, whenAll, mapReduce.
 * All inputs are launched before any of them is awaited; the joined future settles
 * once every input has settled.
 */

import {
  Completion,
  futurize,
  makeFailedFuture,
  makeReadyFuture,
  type Future,
} from "./future.js";
import { rethrowIfViolation } from "./contract.js";
import {
  noteStep,
  noteSuspension,
  registerCombinator,
  settleCombinator,
  type CombinatorType,
} from "./debug.js";

/** Reports the joined future's outcome to the debugger without consuming it for the caller. */
function traced<T>(trace: number | undefined, joined: Future<T>): Future<T> {
  if (trace === undefined) return joined;
  return joined.thenWrapped((settled) => {
    settleCombinator(trace, settled.failed ? "failed" : "ready");
    return settled;
  });
}

/**
 * Links `step` into the join chain: the link settles once both the step and every
 * earlier link have settled. The earliest failure in launch order wins.
 */
function link(previous: Future<void>, step: Future<void>): Future<void> {
  return step.thenWrapped((done) =>
    previous.thenWrapped((before) => (before.failed ? before : done)),
  );
}

function launchAll<T>(
  items: Iterable<T>,
  action: (item: T) => Future<void>,
  type: CombinatorType,
): Future<void> {
  const trace = registerCombinator(type);
  let joined = makeReadyFuture();
  try {
    for (const item of items) {
      noteStep(trace);
      const step = futurize(() => action(item));
      if (!step.available) noteSuspension(trace);
      joined = link(joined, step);
    }
  } catch (error) {
    rethrowIfViolation(error);
    joined = link(joined, makeFailedFuture(error));
  }
  return traced(trace, joined);
}

/**
 * Runs `action` for every item at once, without waiting for earlier items, and
 * resolves once all of them have completed. A failing action does not stop the
 * others; when several fail, the one launched first is reported.
 *
 * @example
 * parallelForEach(peers, (peer) => peer.flush());
 */
export function parallelForEach<T>(
  items: Iterable<T>,
  action: (item: T) => Future<void>,
): Future<void> {
  return launchAll(items, action, "parallelForEach");
}

function whenAllContinued(
  futures: readonly Future<unknown>[],
  start: number,
  outcomes: Future<unknown>[],
  completion: Completion<Future<unknown>[]>,
  trace: number | undefined,
): void {
  for (let index = start; index < futures.length; index++) {
    const future = futures[index];
    noteStep(trace);
    if (!future.available) {
      noteSuspension(trace);
      future.onSettled((settled) => {
        outcomes.push(settled);
        whenAllContinued(futures, index + 1, outcomes, completion, trace);
      });
      return;
    }
    future.onSettled((settled) => outcomes.push(settled));
  }
  settleCombinator(trace, "ready");
  completion.setValue(outcomes);
}

/**
 * Waits for already-started futures and resolves with all of them, settled and in
 * input order. Never fails: a failed input stays failed at its position in the tuple.
 *
 * @example
 * whenAll(fetchUser(id), fetchOrders(id)).andThen(([user, orders]) => ...);
 */
export function whenAll(): Future<[]>;
export function whenAll<H, R extends Future<unknown>[]>(
  head: Future<H>,
  ...rest: R
): Future<[Future<H>, ...R]>;
export function whenAll<T>(...futures: Future<T>[]): Future<Future<T>[]>;
export function whenAll(...futures: Future<unknown>[]): Future<Future<unknown>[]> {
  const completion = new Completion<Future<unknown>[]>();
  const result = completion.getFuture();
  whenAllContinued(futures, 0, [], completion, registerCombinator("whenAll"));
  return result;
}

/**
 * Runs `mapper` for every item at once and folds each value into the accumulator
 * with `reducer` as it arrives (completion order). Resolves with the final
 * accumulator once every mapper has completed; fails like {@link parallelForEach}.
 */
export function mapReduce<T, M, A>(
  items: Iterable<T>,
  mapper: (item: T) => Future<M>,
  initial: A,
  reducer: (accumulator: A, value: M) => A,
): Future<A> {
  let accumulator = initial;
  return launchAll(
    items,
    (item) =>
      futurize(() => mapper(item)).andThen((value) => {
        accumulator = reducer(accumulator, value);
      }),
    "mapReduce",
  ).andThen(() => accumulator);
}
