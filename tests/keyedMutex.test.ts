import { createKeyedMutex } from "../backend/src/realtime/keyedMutex";

function deferred(): { promise: Promise<void>; resolve(): void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("keyedMutex", () => {
  it("Given two tasks on the same key When the first is slow Then the second starts only after the first finishes", async () => {
    const mutex = createKeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("b1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("b1", async () => {
      order.push("second");
    });

    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(order).toEqual(["first:start"]);
    expect(mutex.isLocked("b1")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("Given a blocked key When a task runs on another key Then it does not wait", async () => {
    const mutex = createKeyedMutex();
    const gate = deferred();

    const blocked = mutex.runExclusive("b1", async () => {
      await gate.promise;
    });
    const other = await mutex.runExclusive("b2", async () => "done");

    expect(other).toBe("done");
    expect(mutex.isLocked("b1")).toBe(true);
    gate.resolve();
    await blocked;
  });

  it("Given a task that throws When the next task runs Then the lock was released and the error reached the caller", async () => {
    const mutex = createKeyedMutex();

    await expect(
      mutex.runExclusive("b1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive("b1", async () => 42)).resolves.toBe(42);
  });

  it("Given all tasks have finished When the mutex is inspected Then no key is retained", async () => {
    const mutex = createKeyedMutex();
    await Promise.all([
      mutex.runExclusive("b1", async () => 1),
      mutex.runExclusive("b1", async () => 2),
      mutex.runExclusive("b2", async () => 3)
    ]);

    expect(mutex.activeKeyCount()).toBe(0);
    expect(mutex.isLocked("b1")).toBe(false);
  });
});
