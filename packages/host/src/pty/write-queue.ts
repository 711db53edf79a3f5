import type { Scheduler } from "./types.js";

export interface WriteQueueOptions {
  /** Queued characters beyond which the oldest input is dropped. */
  maxPending: number;
  /** Characters handed to the sink per scheduled flush. */
  flushChunkSize: number;
  schedule: Scheduler;
}

export interface WriteQueue {
  enqueue: (data: string) => void;
  clear: () => void;
  readonly pending: number;
  /** Characters dropped so far because the queue was full. */
  readonly dropped: number;
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/**
 * Input waiting for the child. Flushes asynchronously in bounded chunks;
 * when the child stops reading and the bound is exceeded, the oldest whole
 * writes go first, and a single oversize write keeps only its newest tail.
 */
export function createWriteQueue(sink: (data: string) => void, options: WriteQueueOptions): WriteQueue {
  const queue: string[] = [];
  let pending = 0;
  let dropped = 0;
  let scheduled = false;

  function trim(): void {
    while (pending > options.maxPending && queue.length > 1) {
      const oldest = queue.shift() ?? "";
      pending -= oldest.length;
      dropped += oldest.length;
    }
    const only = queue[0];
    if (only !== undefined && pending > options.maxPending) {
      let keep = only.slice(only.length - options.maxPending);
      if (isLowSurrogate(keep.charCodeAt(0))) keep = keep.slice(1);
      dropped += only.length - keep.length;
      queue[0] = keep;
      pending = keep.length;
    }
  }

  function take(budget: number): string {
    let out = "";
    while (budget > 0) {
      const head = queue[0];
      if (head === undefined) break;
      let size = Math.min(head.length, budget);
      if (size < head.length && isHighSurrogate(head.charCodeAt(size - 1))) {
        // A pair that does not fit waits for the next chunk unless nothing else would go out.
        size = out === "" && size === 1 ? 2 : size - 1;
      }
      out += head.slice(0, size);
      pending -= size;
      budget -= size;
      if (size < head.length) {
        queue[0] = head.slice(size);
        break;
      }
      queue.shift();
    }
    return out;
  }

  function flush(): void {
    scheduled = false;
    const chunk = take(options.flushChunkSize);
    if (chunk !== "") {
      try {
        sink(chunk);
      } catch (err) {
        console.error("Failed to write to pty:", err);
      }
    }
    if (queue.length > 0) scheduleFlush();
  }

  function scheduleFlush(): void {
    if (scheduled) return;
    scheduled = true;
    options.schedule(flush);
  }

  return {
    enqueue: (data) => {
      if (data === "") return;
      queue.push(data);
      pending += data.length;
      trim();
      scheduleFlush();
    },
    clear: () => {
      queue.length = 0;
      pending = 0;
    },
    get pending() {
      return pending;
    },
    get dropped() {
      return dropped;
    },
  };
}
