import { describe, it, expect, vi } from "vitest";
import { TaskScope, Semaphore } from "../../src/scope.js";
import { ScopeClosedError } from "../../src/errors.js";

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((_, reject) => {
    if (signal.aborted) return reject(signal.reason);
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("TaskScope", () => {
  it("runs spawned tasks concurrently and join waits for all of them", async () => {
    const scope = new TaskScope({ onError: vi.fn() });
    const order: string[] = [];
    let releaseFirst = (): void => undefined;
    const gate = new Promise<void>((resolve) => { releaseFirst = resolve; });

    scope.spawn(async () => {
      await gate;
      order.push("first");
    });
    scope.spawn(async () => {
      order.push("second");
      releaseFirst();
    });

    await scope.join();
    expect(order).toEqual(["second", "first"]);
    expect(scope.size).toBe(0);
  });

  it("cancel aborts the signal handed to every task", async () => {
    const onError = vi.fn();
    const scope = new TaskScope({ onError });
    scope.spawn((signal) => waitForAbort(signal));
    scope.spawn((signal) => waitForAbort(signal));

    await scope.close(new Error("stop"));
    expect(scope.cancelled).toBe(true);
    expect(onError).toHaveBeenCalledTimes(2);
    expect(onError.mock.calls[0]?.[0]).toEqual(new Error("stop"));
  });

  it("refuses new tasks once cancelled", () => {
    const scope = new TaskScope({ onError: vi.fn() });
    scope.cancel();
    expect(() => scope.spawn(async () => undefined)).toThrow(ScopeClosedError);
  });

  it("routes task rejections to onError", async () => {
    const onError = vi.fn();
    const scope = new TaskScope({ onError });
    scope.spawn(async () => {
      throw new Error("task failed");
    });
    await scope.join();
    expect(onError).toHaveBeenCalledWith(new Error("task failed"));
  });

  it("is cancelled when its parent aborts", async () => {
    const parent = new AbortController();
    const scope = new TaskScope({ parent: parent.signal, onError: vi.fn() });
    scope.spawn((signal) => waitForAbort(signal));

    parent.abort("shutdown");
    await scope.join();
    expect(scope.cancelled).toBe(true);
    expect(scope.signal.reason).toBe("shutdown");
  });

  it("starts cancelled under an already aborted parent", () => {
    const parent = new AbortController();
    parent.abort();
    const scope = new TaskScope({ parent: parent.signal, onError: vi.fn() });
    expect(scope.cancelled).toBe(true);
  });

  it("join also waits for tasks spawned while joining", async () => {
    const scope = new TaskScope({ onError: vi.fn() });
    const done: string[] = [];
    scope.spawn(async () => {
      scope.spawn(async () => {
        await new Promise((r) => setTimeout(r, 5));
        done.push("child");
      });
      done.push("parent");
    });
    await scope.join();
    expect(done).toEqual(["parent", "child"]);
  });
});

describe("Semaphore", () => {
  it("admits up to max holders and queues the rest in order", async () => {
    const sem = new Semaphore(2);
    await sem.acquire();
    await sem.acquire();
    expect(sem.active).toBe(2);

    const order: number[] = [];
    const third = sem.acquire().then(() => order.push(3));
    const fourth = sem.acquire().then(() => order.push(4));
    expect(sem.waiting).toBe(2);

    sem.release();
    await third;
    sem.release();
    await fourth;
    expect(order).toEqual([3, 4]);
    expect(sem.active).toBe(2);
  });

  it("tryAcquire only takes a free slot", () => {
    const sem = new Semaphore(1);
    expect(sem.tryAcquire()).toBe(true);
    expect(sem.tryAcquire()).toBe(false);
    sem.release();
    expect(sem.tryAcquire()).toBe(true);
  });

  it("rejects a size that is not a positive integer", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });
});
