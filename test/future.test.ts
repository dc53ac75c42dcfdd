import { describe, it, expect, vi, afterEach } from "vitest";
import {
  Completion,
  ContractViolationError,
  QueueScheduler,
  flushSync,
  futurize,
  makeFailedFuture,
  makeReadyFuture,
  resetScheduler,
  setScheduler,
  type Future,
} from "chainlet";

afterEach(() => {
  resetScheduler();
});

describe("Future state", () => {
  it("ready future is available and yields its value", () => {
    const f = makeReadyFuture(42);
    expect(f.status).toBe("ready");
    expect(f.available).toBe(true);
    expect(f.failed).toBe(false);
    expect(f.get()).toBe(42);
  });

  it("makeReadyFuture() with no argument is a ready Future<void>", () => {
    const f: Future<void> = makeReadyFuture();
    expect(f.available).toBe(true);
    expect(f.get()).toBeUndefined();
  });

  it("failed future reports failure and get() throws the payload", () => {
    const err = new Error("boom");
    const f = makeFailedFuture<number>(err);
    expect(f.status).toBe("failed");
    expect(f.failed).toBe(true);
    expect(() => f.get()).toThrow(err);
  });

  it("getFailure() returns the payload without throwing", () => {
    const f = makeFailedFuture("reason");
    expect(f.getFailure()).toBe("reason");
  });

  it("completion future is pending until set", () => {
    const c = new Completion<string>();
    const f = c.getFuture();
    expect(f.status).toBe("pending");
    expect(f.available).toBe(false);
    c.setValue("done");
    expect(c.settled).toBe(true);
    expect(f.available).toBe(true);
    expect(f.get()).toBe("done");
  });

  it("completion failure surfaces on the future", () => {
    const c = new Completion<number>();
    const f = c.getFuture();
    c.setFailure("nope");
    expect(f.failed).toBe(true);
    expect(f.getFailure()).toBe("nope");
  });
});

describe("Future.andThen", () => {
  it("runs inline when the future is already ready", () => {
    const seen: number[] = [];
    const next = makeReadyFuture(1).andThen((v) => {
      seen.push(v);
      return v + 1;
    });
    expect(seen).toEqual([1]);
    expect(next.get()).toBe(2);
  });

  it("does not run on the stack of setValue when attached to a pending future", () => {
    const manual = new QueueScheduler();
    setScheduler(manual);
    const c = new Completion<number>();
    const spy = vi.fn((v: number) => v * 10);
    const next = c.getFuture().andThen(spy);
    c.setValue(3);
    expect(spy).not.toHaveBeenCalled();
    expect(manual.pending).toBe(1);
    manual.runPending();
    expect(spy).toHaveBeenCalledWith(3);
    expect(next.get()).toBe(30);
  });

  it("waits on a future returned from the continuation", () => {
    const manual = new QueueScheduler();
    setScheduler(manual);
    const inner = new Completion<string>();
    const next = makeReadyFuture(1).andThen(() => inner.getFuture());
    expect(next.available).toBe(false);
    inner.setValue("inner");
    manual.runPending();
    expect(next.get()).toBe("inner");
  });

  it("skips the continuation on failure and passes the failure through", () => {
    const err = new Error("upstream");
    const spy = vi.fn();
    const next = makeFailedFuture<number>(err).andThen(spy);
    expect(spy).not.toHaveBeenCalled();
    expect(next.getFailure()).toBe(err);
  });

  it("turns a throwing continuation into a failed future", () => {
    const err = new Error("thrown");
    const next = makeReadyFuture(1).andThen(() => {
      throw err;
    });
    expect(next.getFailure()).toBe(err);
  });
});

describe("Future.thenWrapped", () => {
  it("receives the terminal future whatever the outcome", () => {
    const next = makeFailedFuture<number>("bad").thenWrapped((settled) =>
      settled.failed ? `failed:${String(settled.getFailure())}` : "ok",
    );
    expect(next.get()).toBe("failed:bad");
  });

  it("passes the outcome on when the settled future is returned", () => {
    const next = makeReadyFuture("x").thenWrapped((settled) => settled);
    expect(next.get()).toBe("x");
  });
});

describe("Future.handleException", () => {
  it("recovers a failure with a value", () => {
    const next = makeFailedFuture<number>("bad").handleException(() => 7);
    expect(next.get()).toBe(7);
  });

  it("leaves a ready value untouched", () => {
    const spy = vi.fn(() => 0);
    const next = makeReadyFuture(5).handleException(spy);
    expect(spy).not.toHaveBeenCalled();
    expect(next.get()).toBe(5);
  });
});

describe("Future.forwardTo", () => {
  it("moves a pending outcome into another completion once settled", () => {
    const source = new Completion<number>();
    const target = new Completion<number>();
    const result = target.getFuture();
    source.getFuture().forwardTo(target);
    source.setValue(9);
    expect(result.available).toBe(false);
    flushSync();
    expect(result.get()).toBe(9);
  });
});

describe("Future await", () => {
  it("await resolves with the value", async () => {
    const c = new Completion<number>();
    const f = c.getFuture();
    setTimeout(() => c.setValue(11), 1);
    await expect(f).resolves.toBe(11);
  });

  it("await rejects with the failure", async () => {
    const err = new Error("await failure");
    await expect(makeFailedFuture(err)).rejects.toBe(err);
  });
});

describe("futurize", () => {
  it("turns a synchronous throw into a failed future", () => {
    const err = new Error("sync throw");
    const f = futurize<number>(() => {
      throw err;
    });
    expect(f.getFailure()).toBe(err);
  });

  it("returns the produced future untouched", () => {
    expect(futurize(() => makeReadyFuture("v")).get()).toBe("v");
  });
});

describe("handle contract", () => {
  it("attaching twice throws ContractViolationError", () => {
    const f = makeReadyFuture(1);
    f.andThen(() => undefined);
    expect(() => f.andThen(() => undefined)).toThrow(ContractViolationError);
  });

  it("querying a consumed future throws", () => {
    const f = makeReadyFuture(1);
    f.get();
    expect(() => f.available).toThrow(ContractViolationError);
  });

  it("get() on a pending future throws", () => {
    const c = new Completion<number>();
    const f = c.getFuture();
    expect(() => f.get()).toThrow(ContractViolationError);
  });

  it("getFailure() on a ready future throws", () => {
    expect(() => makeReadyFuture(1).getFailure()).toThrow(ContractViolationError);
  });

  it("getFuture() twice throws", () => {
    const c = new Completion<number>();
    c.getFuture();
    expect(() => c.getFuture()).toThrow(ContractViolationError);
  });

  it("settling a completion twice throws and keeps the first outcome", () => {
    const c = new Completion<number>();
    const f = c.getFuture();
    c.setValue(1);
    expect(() => c.setValue(2)).toThrow(ContractViolationError);
    expect(() => c.setFailure("late")).toThrow(ContractViolationError);
    expect(f.get()).toBe(1);
  });

  it("awaiting a consumed future throws synchronously", () => {
    const f = makeReadyFuture(1);
    f.get();
    expect(() => f.then(() => undefined)).toThrow(ContractViolationError);
  });
});
