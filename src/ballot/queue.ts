/**
 * Single-writer operation queue
 *
 * Every top-level ballot operation runs to completion before the next one
 * starts, so reads and the commit that follows them never interleave with
 * another caller's.
 */

export class OperationQueue {
  private queue: Array<() => Promise<void>> = [];
  private processing = false;

  /**
   * Queue an operation; settles with the operation's own outcome
   */
  run<T>(operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await operation());
        } catch (error) {
          // A failed operation does not stop the ones behind it
          reject(error);
        }
      });
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    let task = this.queue.shift();
    while (task) {
      await task();
      task = this.queue.shift();
    }

    this.processing = false;
  }
}
