export type Release = () => void;

export class Mutex {
  private chain: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  // Resolves once every earlier holder has released. Release is idempotent.
  acquire(): Promise<Release> {
    const previous = this.chain;
    let unlock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    this.chain = previous.then(() => held);

    return previous.then(() => {
      this.holders++;
      let released = false;
      return () => {
        if (released) return;
        released = true;
        this.holders--;
        unlock();
      };
    });
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
