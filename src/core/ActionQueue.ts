/**
 * ActionQueue - Runs input events one at a time.
 *
 * Every key press and resize goes through this queue, so an event (and the
 * git calls it makes) is handled to completion before the next one starts.
 * The outline and the frame buffer are only touched from queued actions.
 */
export class ActionQueue {
  private queue: (() => Promise<void>)[] = [];
  private isProcessing = false;

  /**
   * Enqueue an action to be executed after everything queued before it.
   * Returns a promise that settles with the action's result.
   */
  enqueue<T>(action: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await action());
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      });
      void this.processNext();
    });
  }

  private async processNext(): Promise<void> {
    if (this.isProcessing) return;
    const next = this.queue.shift();
    if (!next) return;

    this.isProcessing = true;
    try {
      await next();
    } finally {
      this.isProcessing = false;
      void this.processNext();
    }
  }
}
