import { withTimeout } from '../../../lib/timeouts';

export type Release = () => void;

/**
 * FIFO lock per key. Holders of different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string, timeoutMs = 0): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let unlock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    try {
      await withTimeout(previous, timeoutMs, `Lock on ${key}`);
    } catch (error) {
      // Give up our place in the queue once the current holder is done.
      void previous.then(unlock);
      throw error;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
    };
  }
}
