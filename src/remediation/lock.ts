import { randomUUID } from "node:crypto";

export type ResourceLock = {
  id: string;
  key: string;
  acquiredAt: string;
  release(): void;
};

/**
 * Per-key FIFO lock. `acquire` resolves once every earlier holder of the
 * same key has released; different keys never wait on each other.
 */
export class ResourceLocks {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string, now: () => string = () => new Date().toISOString()): Promise<ResourceLock> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return {
      id: randomUUID(),
      key,
      acquiredAt: now(),
      release: () => {
        if (released) return;
        released = true;
        unlock();
        if (this.tails.get(key) === tail) this.tails.delete(key);
      },
    };
  }

  isHeld(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
