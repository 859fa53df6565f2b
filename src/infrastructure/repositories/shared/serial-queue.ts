/**
 * Runs tasks one at a time in submission order.
 *
 * SQLite has a single writer and TypeORM shares one connection for it, so
 * transactions started concurrently would interleave their statements.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The next task waits for this one however it settles.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
