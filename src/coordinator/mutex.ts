/**
 * Serializes async work: each run starts after the previous one settles,
 * whether it resolved or rejected.
 */
export class Mutex {
  private chain: Promise<void> = Promise.resolve();

  async run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.chain.then(task, task);
    this.chain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
