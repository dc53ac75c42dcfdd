/**
 * Scheduler – runs continuations whose future was still pending when they were attached.
 * The default drains a FIFO queue in one microtask turn; tasks queued while draining
 * run in the same loop, never on the stack of the code that queued them.
 */

/** A unit of deferred work handed to the scheduler. */
export type ScheduledTask = () => void;

/**
 * The contract the combinators consume from the surrounding reactor. Implementations
 * must run every scheduled task exactly once, in FIFO order, and never synchronously
 * from inside `schedule`.
 */
export interface Scheduler {
  schedule(task: ScheduledTask): void;
}

/**
 * FIFO queue drained by an explicit {@link QueueScheduler.runPending} call. Used directly
 * as a manual scheduler (tests, embedders driving their own loop) and as the base of the
 * default microtask scheduler.
 */
export class QueueScheduler implements Scheduler {
  #queue: ScheduledTask[] = [];
  #head = 0;
  #draining = false;

  schedule(task: ScheduledTask): void {
    this.#queue.push(task);
  }

  /** Number of tasks waiting to run. */
  get pending(): number {
    return this.#queue.length - this.#head;
  }

  /**
   * Runs queued tasks, including those queued while running, until the queue is empty.
   * Returns the number of tasks run. Re-entrant calls return 0 and leave the work to
   * the outer drain. A throwing task stops the drain; the remaining tasks stay queued.
   */
  runPending(): number {
    if (this.#draining) return 0;
    this.#draining = true;
    let ran = 0;
    try {
      while (this.#head < this.#queue.length) {
        const task = this.#queue[this.#head];
        this.#queue[this.#head] = noop;
        this.#head++;
        ran++;
        task();
      }
    } finally {
      this.#compact();
      this.#draining = false;
    }
    return ran;
  }

  #compact(): void {
    if (this.#head === 0) return;
    this.#queue = this.#queue.slice(this.#head);
    this.#head = 0;
  }
}

function noop(): void {}

/** Queue scheduler that drains itself in a microtask after the first task is queued. */
export class MicrotaskScheduler extends QueueScheduler {
  #scheduled = false;

  override schedule(task: ScheduledTask): void {
    super.schedule(task);
    if (!this.#scheduled) {
      this.#scheduled = true;
      queueMicrotask(() => this.#flush());
    }
  }

  #flush(): void {
    this.#scheduled = false;
    try {
      this.runPending();
    } finally {
      if (this.pending > 0 && !this.#scheduled) {
        this.#scheduled = true;
        queueMicrotask(() => this.#flush());
      }
    }
  }
}

const defaultScheduler = new MicrotaskScheduler();
let current: Scheduler = defaultScheduler;

/** Hands a task to the active scheduler. @internal */
export function schedule(task: ScheduledTask): void {
  current.schedule(task);
}

/** Returns the active scheduler. */
export function getScheduler(): Scheduler {
  return current;
}

/**
 * Replaces the active scheduler (e.g. with a reactor's own task queue or a
 * {@link QueueScheduler} driven by hand). Returns the previous scheduler.
 * Continuations already queued on the previous scheduler stay there.
 */
export function setScheduler(scheduler: Scheduler): Scheduler {
  const previous = current;
  current = scheduler;
  return previous;
}

/** Restores the default microtask scheduler. */
export function resetScheduler(): void {
  current = defaultScheduler;
}

/**
 * Drains the default scheduler's queue now instead of waiting for its microtask.
 * Returns the number of tasks run.
 */
export function flushSync(): number {
  return defaultScheduler.runPending();
}
