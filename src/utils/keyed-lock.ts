import { recordLockWait } from "../observability/metrics";

type LockEntry = {
  tail: Promise<void>;
  pending: number;
};

/**
 * In-process exclusive lock per key. Work for one key runs strictly one at
 * a time in arrival order; different keys never wait on each other. An
 * entry is dropped as soon as nobody holds or waits for its key.
 */
export class KeyedLock {
  private readonly entries = new Map<string, LockEntry>();

  constructor(private readonly scope = "default") {}

  get size() {
    return this.entries.size;
  }

  isLocked(key: string) {
    return this.entries.has(key);
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const entry = this.entries.get(key) ?? {
      tail: Promise.resolve(),
      pending: 0,
    };
    const contended = entry.pending > 0;
    const previous = entry.tail;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    entry.tail = previous.then(() => current);
    entry.pending += 1;
    this.entries.set(key, entry);

    const waitStart = process.hrtime.bigint();
    await previous;
    if (contended) {
      recordLockWait(
        this.scope,
        Number(process.hrtime.bigint() - waitStart) / 1_000_000
      );
    }

    try {
      return await task();
    } finally {
      entry.pending -= 1;
      if (entry.pending === 0 && this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
      release();
    }
  }
}
