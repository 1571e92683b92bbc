// Serializes outbound searches: one active slot, a bounded line of waiting searches.
import { NetworkError, SearchBusyError } from '@/types/errors';

interface QueuedSearch {
  start: () => void;
}

const MAX_CONCURRENT_SEARCHES = 1;
const DEFAULT_MAX_QUEUE_SIZE = 10;

export class SearchQueue {
  private readonly waiting: QueuedSearch[] = [];
  private processingCount = 0;

  constructor(private readonly maxQueueSize: number = DEFAULT_MAX_QUEUE_SIZE) {}

  getProcessingCount(): number {
    return this.processingCount;
  }

  getQueueLength(): number {
    return this.waiting.length;
  }

  /**
   * Runs the task once a slot frees up. A search whose signal aborts while it waits
   * leaves the line and never runs.
   * @throws SearchBusyError when the waiting line is already full
   * @throws NetworkError when the signal aborts before the task starts
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw abandoned();
    }

    if (this.processingCount >= MAX_CONCURRENT_SEARCHES) {
      if (this.waiting.length >= this.maxQueueSize) {
        throw new SearchBusyError(this.waiting.length);
      }
      await this.waitForSlot(signal);
    } else {
      this.processingCount++;
    }

    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private waitForSlot(signal: AbortSignal | undefined): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: QueuedSearch = {
        start: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      const onAbort = () => {
        const index = this.waiting.indexOf(entry);
        if (index !== -1) this.waiting.splice(index, 1);
        reject(abandoned());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiting.push(entry);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next search; processingCount is unchanged.
      next.start();
    } else {
      this.processingCount--;
    }
  }
}

function abandoned(): NetworkError {
  return new NetworkError('Search abandoned before it started', 'ERR_CANCELED');
}
