export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(section: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;

    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;

    try {
      return await section();
    } finally {
      release();
    }
  }
}
