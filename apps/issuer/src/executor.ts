/**
 * Serial executor: every mutating operation runs to completion before
 * the next starts. Operations are totally ordered by submission.
 */

export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The chain only tracks completion; the caller receives the rejection.
    this.tail = result.catch(() => undefined);
    return result;
  }
}
