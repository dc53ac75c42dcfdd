/**
 * Internal debug module for combinator tracing.
 * No allocations when debugEnabled is false.
 */

/**
 * Pluggable logger for combinator-debug output. Implement this interface and pass
 * to enableFutureDebug(logger) to route settle lines (debug) and subscriber
 * throw reporting (error) to your logger. Optional meta supports structured loggers.
 */
export interface Logger {
  /** Log at debug level (e.g. one line per settled combinator). */
  debug(msg: string, meta?: object): void;
  /** Log at warn level. */
  warn(msg: string, meta?: object): void;
  /** Log at error level (e.g. subscriber-throw reporting). */
  error(msg: string, meta?: object): void;
}

export type CombinatorType =
  | "doForEach"
  | "doUntil"
  | "keepDoing"
  | "repeat"
  | "parallelForEach"
  | "whenAll"
  | "mapReduce";

export type SettledStatus = "ready" | "failed";

/** Event payload for realtime combinator debug (discriminated union). */
export type FutureDebugEvent =
  | { kind: "combinatorStarted"; id: number; type: CombinatorType }
  | { kind: "combinatorSuspended"; id: number; type: CombinatorType; step: number }
  | {
      kind: "combinatorSettled";
      id: number;
      type: CombinatorType;
      status: SettledStatus;
      steps: number;
      suspensions: number;
      timing: { startTime: number; endTime: number };
    };

type FutureDebugSubscriber = (event: FutureDebugEvent) => void;

type TraceNode = {
  id: number;
  type: CombinatorType;
  steps: number;
  suspensions: number;
  startTime: number;
};

/**
 * Instance-based debugger for combinator tracing. Holds all debug state;
 * one default instance is used by the public API.
 */
export class FutureDebugger {
  #debugEnabled = false;
  #logger: Logger | null = null;
  #subscribers: FutureDebugSubscriber[] | null = null;
  #nextId = 0;
  readonly #traces = new Map<number, TraceNode>();

  #sink(level: "debug" | "warn" | "error", msg: string, meta?: object): void {
    const logger = this.#logger;
    if (logger) {
      try {
        logger[level](msg, meta);
        return;
      } catch {
        // Fall back to console if logger throws
      }
    }
    if (level === "debug") {
      // eslint-disable-next-line no-console
      console.log(msg);
    } else if (level === "warn") {
      // eslint-disable-next-line no-console
      console.warn(msg);
    } else {
      // eslint-disable-next-line no-console
      console.error(msg, meta);
    }
  }

  #emit(event: FutureDebugEvent): void {
    if (this.#subscribers === null || this.#subscribers.length === 0) return;
    for (const fn of this.#subscribers) {
      try {
        fn(event);
      } catch (err) {
        this.#sink("error", "[chainlet] subscribeFutureDebug subscriber threw:", { error: err });
      }
    }
  }

  #formatTrace(node: TraceNode, status: SettledStatus, endTime: number): string {
    const steps = node.steps === 1 ? "1 step" : `${node.steps} steps`;
    const suspensions =
      node.suspensions === 1 ? "1 suspension" : `${node.suspensions} suspensions`;
    return `${node.type}#${node.id} (${status} after ${steps}, ${suspensions} in ${endTime - node.startTime}ms)`;
  }

  enable(logger?: Logger): void {
    this.#logger = logger ?? null;
    this.#debugEnabled = true;
  }

  disable(): void {
    this.#debugEnabled = false;
    this.#logger = null;
    this.#subscribers = null;
    this.#traces.clear();
  }

  subscribe(callback: FutureDebugSubscriber): () => void {
    if (!this.#debugEnabled) return () => {};
    this.#subscribers ??= [];
    this.#subscribers.push(callback);
    return () => {
      if (this.#subscribers === null) return;
      const i = this.#subscribers.indexOf(callback);
      if (i !== -1) this.#subscribers.splice(i, 1);
    };
  }

  isEnabled(): boolean {
    return this.#debugEnabled;
  }

  registerCombinator(type: CombinatorType): number | undefined {
    if (!this.#debugEnabled) return undefined;
    const id = ++this.#nextId;
    this.#traces.set(id, { id, type, steps: 0, suspensions: 0, startTime: Date.now() });
    if (this.#subscribers?.length) {
      this.#emit({ kind: "combinatorStarted", id, type });
    }
    return id;
  }

  noteStep(id: number | undefined): void {
    if (id === undefined) return;
    const node = this.#traces.get(id);
    if (node) node.steps++;
  }

  noteSuspension(id: number | undefined): void {
    if (id === undefined) return;
    const node = this.#traces.get(id);
    if (!node) return;
    node.suspensions++;
    if (this.#subscribers?.length) {
      this.#emit({ kind: "combinatorSuspended", id, type: node.type, step: node.steps });
    }
  }

  settleCombinator(id: number | undefined, status: SettledStatus): void {
    if (id === undefined || !this.#debugEnabled) return;
    const node = this.#traces.get(id);
    if (!node) return;
    this.#traces.delete(id);
    const endTime = Date.now();
    this.#sink("debug", this.#formatTrace(node, status, endTime));
    if (this.#subscribers?.length) {
      this.#emit({
        kind: "combinatorSettled",
        id,
        type: node.type,
        status,
        steps: node.steps,
        suspensions: node.suspensions,
        timing: { startTime: node.startTime, endTime },
      });
    }
  }
}

const defaultDebugger = new FutureDebugger();

/**
 * Default singleton debugger used by the public API. Advanced use only;
 * prefer enableFutureDebug(), subscribeFutureDebug(), etc.
 */
export const futureDebugger = defaultDebugger;

/**
 * Enables combinator tracing for the default debugger. Each combinator logs one
 * line when it settles; output goes to console unless a logger is supplied.
 * @param logger - Optional logger; when provided, output uses logger.debug /
 *   logger.error instead of console.
 */
export function enableFutureDebug(logger?: Logger): void {
  defaultDebugger.enable(logger);
}

/** Internal use for tests only; not part of public API. */
export function disableFutureDebug(): void {
  defaultDebugger.disable();
}

export function subscribeFutureDebug(callback: (event: FutureDebugEvent) => void): () => void {
  return defaultDebugger.subscribe(callback);
}

export function registerCombinator(type: CombinatorType): number | undefined {
  return defaultDebugger.registerCombinator(type);
}

export function noteStep(id: number | undefined): void {
  defaultDebugger.noteStep(id);
}

export function noteSuspension(id: number | undefined): void {
  defaultDebugger.noteSuspension(id);
}

export function settleCombinator(id: number | undefined, status: SettledStatus): void {
  defaultDebugger.settleCombinator(id, status);
}
