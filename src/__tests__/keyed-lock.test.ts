import { KeyedLock } from "../utils/keyed-lock";
import { deferred, nextTick } from "./fixtures";

describe("KeyedLock", () => {
  it("runs work for one key in arrival order without overlap", async () => {
    const lock = new KeyedLock("test");
    const events: string[] = [];

    const results = await Promise.all(
      ["a", "b", "c"].map((name) =>
        lock.runExclusive("series", async () => {
          events.push(`${name}:start`);
          await nextTick();
          events.push(`${name}:end`);
          return name;
        })
      )
    );

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual([
      "a:start",
      "a:end",
      "b:start",
      "b:end",
      "c:start",
      "c:end",
    ]);
    expect(lock.size).toBe(0);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock("test");
    const gate = deferred();
    const events: string[] = [];

    const slow = lock.runExclusive("a", async () => {
      await gate.promise;
      events.push("a");
    });
    await lock.runExclusive("b", () => {
      events.push("b");
    });

    expect(events).toEqual(["b"]);
    expect(lock.isLocked("a")).toBe(true);
    expect(lock.isLocked("b")).toBe(false);

    gate.resolve();
    await slow;
    expect(events).toEqual(["b", "a"]);
    expect(lock.size).toBe(0);
  });

  it("releases the key when the work throws", async () => {
    const lock = new KeyedLock("test");

    await expect(
      lock.runExclusive("k", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.runExclusive("k", async () => 42)).resolves.toBe(42);
    expect(lock.size).toBe(0);
  });

  it("keeps read-modify-write sequences consistent", async () => {
    const lock = new KeyedLock("test");
    let counter = 0;

    await Promise.all(
      Array.from({ length: 50 }, () =>
        lock.runExclusive("counter", async () => {
          const read = counter;
          await nextTick();
          counter = read + 1;
        })
      )
    );

    expect(counter).toBe(50);
  });
});
