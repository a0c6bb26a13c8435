/**
 * Async mutex with FIFO hand-off
 * Teardown runs under it so two callers never release the same entry
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Wait for every earlier holder, then resolve with the unlock function
   */
  async lock(): Promise<() => void> {
    let unlock: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      unlock = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => released);
    await previous;

    return unlock;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const unlock = await this.lock();
    try {
      return await fn();
    } finally {
      unlock();
    }
  }
}
