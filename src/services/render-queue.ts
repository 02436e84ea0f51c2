/**
 * Render admission gate
 *
 * Counting semaphore bounding how many renders compose images at once.
 * Waiters are served FIFO; a waiter whose signal aborts is removed from the
 * queue and rejected with the signal's reason, so excess requests never wait
 * past their deadline.
 */

export type ReleaseSlot = () => void;

interface Waiter {
  grant: (release: ReleaseSlot) => void;
}

export class RenderQueue {
  private activeCount = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Render concurrency must be a positive integer, got ${capacity}`);
    }
  }

  get active(): number {
    return this.activeCount;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a free slot
   *
   * @returns Release function; calling it more than once has no further effect
   */
  acquire(signal?: AbortSignal): Promise<ReleaseSlot> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.activeCount < this.capacity) {
      this.activeCount++;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<ReleaseSlot>((resolve, reject) => {
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };

      const onAbort = () => {
        const position = this.waiters.indexOf(waiter);
        if (position !== -1) {
          this.waiters.splice(position, 1);
          reject(signal?.reason);
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private createRelease(): ReleaseSlot {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Slot passes straight to the next waiter; activeCount is unchanged.
        next.grant(this.createRelease());
      } else {
        this.activeCount--;
      }
    };
  }
}
