import { OutputCapture, type WritableChannel } from '../capture';
import { ResultCollector } from '../collector';
import { systemClock, type Clock } from '../core/clock';
import type { TestEvent } from '../core/types';

/** A clock that reads the timestamps carried by recorded events. */
export class ReplayClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(at: number): void {
    this.current = at;
  }
}

export interface ReplayOptions {
  verbosity?: number;
  stdout?: WritableChannel;
  stderr?: WritableChannel;
}

/**
 * Feeds a recorded run through a fresh collector. `output` events are written
 * to the live stdout/stderr writers so the active capture records them the same
 * way it records a test's own prints. Streams without any `at` timestamps are
 * timed with the system clock.
 */
export function replayEvents(events: readonly TestEvent[], options: ReplayOptions = {}): ResultCollector {
  const firstAt = events.find((event) => event.at !== undefined)?.at;
  const replayClock = firstAt === undefined ? undefined : new ReplayClock(firstAt);
  const clock: Clock = replayClock ?? systemClock;
  const capture = new OutputCapture({ stdout: options.stdout, stderr: options.stderr, clock });
  const collector = new ResultCollector({ verbosity: options.verbosity, clock, capture });

  for (const event of events) {
    if (replayClock && event.at !== undefined) replayClock.set(event.at);

    if (event.type === 'output') {
      capture.write(event.stream, event.text);
    } else {
      collector.dispatch(event);
    }
  }

  collector.endOpenTest();
  return collector;
}
