export interface OutputChannelOptions {
  /** Pending chunks above which `onPause` fires; `onResume` fires at half. */
  highWaterChunks: number;
  onPause: () => void;
  onResume: () => void;
}

export interface OutputChannel {
  push: (chunk: Uint8Array) => void;
  /** Ends the sequence; with `discard`, unread chunks are dropped too. */
  end: (options?: { discard?: boolean | undefined }) => void;
  /** The reading side. Only the first call gets the data. */
  take: () => AsyncIterable<Uint8Array>;
  readonly pending: number;
}

async function* empty(): AsyncGenerator<Uint8Array> {}

export function createOutputChannel(options: OutputChannelOptions): OutputChannel {
  const queue: Uint8Array[] = [];
  let ended = false;
  let taken = false;
  let paused = false;
  let wake: (() => void) | null = null;

  const notify = (): void => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  const maybeResume = (): void => {
    if (paused && queue.length <= Math.floor(options.highWaterChunks / 2)) {
      paused = false;
      options.onResume();
    }
  };

  async function* drain(): AsyncGenerator<Uint8Array> {
    for (;;) {
      const chunk = queue.shift();
      if (chunk) {
        maybeResume();
        yield chunk;
        continue;
      }
      if (ended) return;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  }

  return {
    push: (chunk) => {
      if (ended) return;
      queue.push(chunk);
      if (!paused && queue.length > options.highWaterChunks) {
        paused = true;
        options.onPause();
      }
      notify();
    },
    end: ({ discard = false } = {}) => {
      if (ended) return;
      ended = true;
      if (discard) queue.length = 0;
      notify();
    },
    take: () => {
      if (taken) return empty();
      taken = true;
      return drain();
    },
    get pending() {
      return queue.length;
    },
  };
}
