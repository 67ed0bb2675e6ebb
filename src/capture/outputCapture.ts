import { CaptureInUseError } from '../core/errors';
import { elapsedSeconds, systemClock, type Clock } from '../core/clock';

export type Channel = 'stdout' | 'stderr';

/** The part of a Node write stream that capture replaces. */
export interface WritableChannel {
  write(chunk: string | Uint8Array, ...args: unknown[]): boolean;
}

type WriteFn = WritableChannel['write'];

export interface CaptureSnapshot {
  output: string;
  /** Seconds since the capture was acquired. */
  elapsed: number;
}

export interface CaptureHandle {
  readonly active: boolean;
  /** Everything captured so far, without releasing. */
  snapshot(): CaptureSnapshot;
  /** Restores the original writers. Safe to call more than once. */
  release(): CaptureSnapshot;
}

export interface OutputCaptureOptions {
  stdout?: WritableChannel;
  stderr?: WritableChannel;
  clock?: Clock;
}

const toText = (chunk: string | Uint8Array): string =>
  typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');

const isCallback = (value: unknown): value is () => void => typeof value === 'function';

/**
 * Swaps the process-wide stdout/stderr writers for an in-memory buffer while a
 * test runs. At most one capture is live at a time.
 */
export class OutputCapture {
  private readonly channels: Record<Channel, WritableChannel>;
  private readonly clock: Clock;
  private saved: Record<Channel, WriteFn> | null = null;

  constructor(options: OutputCaptureOptions = {}) {
    this.channels = {
      stdout: options.stdout ?? process.stdout,
      stderr: options.stderr ?? process.stderr,
    };
    this.clock = options.clock ?? systemClock;
  }

  get isCapturing(): boolean {
    return this.saved !== null;
  }

  acquire(): CaptureHandle {
    if (this.saved) {
      throw new CaptureInUseError();
    }

    const chunks: string[] = [];
    const startedAt = this.clock.now();
    const intercept: WriteFn = (chunk, ...args) => {
      chunks.push(toText(chunk));
      const callback = args.find(isCallback);
      if (callback) process.nextTick(callback);
      return true;
    };

    const saved = {
      stdout: this.channels.stdout.write,
      stderr: this.channels.stderr.write,
    };
    this.saved = saved;
    this.channels.stdout.write = intercept;
    this.channels.stderr.write = intercept;

    let final: CaptureSnapshot | null = null;
    const snapshot = (): CaptureSnapshot => ({
      output: chunks.join(''),
      elapsed: elapsedSeconds(startedAt, this.clock.now()),
    });

    return {
      get active() {
        return final === null;
      },
      snapshot: () => final ?? snapshot(),
      release: () => {
        if (final) return final;
        this.channels.stdout.write = saved.stdout;
        this.channels.stderr.write = saved.stderr;
        this.saved = null;
        final = snapshot();
        return final;
      },
    };
  }

  /**
   * Writes to the real channel, bypassing a live capture. Status lines use
   * this so they never end up inside a test's output.
   */
  writeOriginal(channel: Channel, text: string): void {
    const target = this.channels[channel];
    const write = this.saved ? this.saved[channel] : target.write;
    write.call(target, text);
  }

  /** Writes through whatever writer is installed, so a live capture records it. */
  write(channel: Channel, text: string): void {
    this.channels[channel].write(text);
  }

  /** Runs `fn` with output captured; the capture is released on every exit path. */
  async withCapture<T>(fn: () => T | Promise<T>): Promise<CaptureSnapshot & { result: T }> {
    const handle = this.acquire();
    try {
      const result = await fn();
      return { ...handle.release(), result };
    } finally {
      handle.release();
    }
  }
}
