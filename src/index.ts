/**
 * Chainlet – future/completion combinators for sequencing, looping and joining async work
 * @module
 */
export {
  Future,
  Completion,
  makeReadyFuture,
  makeFailedFuture,
  futurize,
  isFuture,
  type FutureStatus,
  type Outcome,
} from "./future.js";
export {
  doForEach,
  doUntil,
  keepDoing,
  repeat,
  type StopIteration,
} from "./primitives.js";
export { parallelForEach, whenAll, mapReduce } from "./join.js";
export {
  QueueScheduler,
  MicrotaskScheduler,
  getScheduler,
  setScheduler,
  resetScheduler,
  flushSync,
  type Scheduler,
  type ScheduledTask,
} from "./scheduler.js";
export {
  enableFutureDebug,
  subscribeFutureDebug,
  FutureDebugger,
  futureDebugger,
  type Logger,
  type FutureDebugEvent,
  type CombinatorType,
  type SettledStatus,
} from "./debug.js";
export {
  onContractViolation,
  ContractViolationError,
  type ContractViolationOptions,
} from "./contract.js";
