import { OutputCapture, type CaptureHandle } from '../capture';
import { systemClock, type Clock } from '../core/clock';
import { emptyCounts, percentPassed, totalOf } from '../core/status';
import type {
  ResultRecord,
  ResultSource,
  StatusCounts,
  SummaryExport,
  TestCaseRef,
  TestEvent,
  TestStatus,
} from '../core/types';
import { formatFailure } from './failureDetail';

/** A failed or errored sub-check; an absent outcome means the sub-check passed. */
export interface SubResultFailure {
  kind: 'failure' | 'error';
  detail: unknown;
}

export type LifecycleEvent = Exclude<TestEvent, { type: 'output' }>;

export interface ResultCollectorOptions {
  /** 0 = silent, 1 = one marker per result, 2 = one line per result. Defaults to 1. */
  verbosity?: number;
  clock?: Clock;
  capture?: OutputCapture;
}

interface Execution {
  test: TestCaseRef;
  capture: CaptureHandle;
  hasSubResults: boolean;
}

const STATUS_MARKERS: Record<TestStatus, string> = {
  pass: 'S',
  fail: 'F',
  error: 'E',
  skip: 's',
};

const SUBTEST_LABELS: Record<SubResultFailure['kind'] | 'pass', string> = {
  pass: 'SubTest Pass',
  failure: 'SubTest Failed',
  error: 'SubTest Error',
};

/**
 * Observes the lifecycle of one test run and turns it into result records.
 *
 * Hooks never throw. Events for a test other than the one currently started
 * are logged and ignored, so everything recorded so far stays renderable.
 */
export class ResultCollector implements ResultSource {
  readonly capture: OutputCapture;
  private readonly clock: Clock;
  private readonly verbosity: number;
  private readonly records: ResultRecord[] = [];
  private readonly tally: StatusCounts = emptyCounts();
  private current: Execution | null = null;
  private runStartedAt: Date;
  private runStoppedAt: Date | undefined;
  private ignored = 0;

  constructor(options: ResultCollectorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.capture = options.capture ?? new OutputCapture({ clock: this.clock });
    this.verbosity = options.verbosity ?? 1;
    this.runStartedAt = new Date(this.clock.now());
  }

  get results(): readonly ResultRecord[] {
    return this.records;
  }

  get counts(): Readonly<StatusCounts> {
    return { ...this.tally };
  }

  get totalCount(): number {
    return totalOf(this.tally);
  }

  get startedAt(): Date {
    return this.runStartedAt;
  }

  get stoppedAt(): Date | undefined {
    return this.runStoppedAt;
  }

  /** Number of events dropped as malformed or unknown. */
  get ignoredEvents(): number {
    return this.ignored;
  }

  onRunStart(): void {
    this.runStartedAt = new Date(this.clock.now());
    this.runStoppedAt = undefined;
  }

  onRunStop(): void {
    this.guard('runStop', () => {
      if (this.current) {
        this.warn(`run stopped while ${this.current.test.id} was still running`);
        this.closeCurrent();
      }
      this.runStoppedAt = new Date(this.clock.now());
    });
  }

  onStart(test: TestCaseRef): void {
    this.guard('start', () => {
      if (this.current) {
        this.warn(`${test.id} started before ${this.current.test.id} stopped`);
        this.closeCurrent();
      }
      this.current = { test, capture: this.capture.acquire(), hasSubResults: false };
    });
  }

  onPass(test: TestCaseRef): void {
    this.guard('pass', () => {
      const execution = this.executionFor(test, 'pass');
      // A test that reported sub-results is already represented by them.
      if (!execution || execution.hasSubResults) return;
      this.emit(execution, 'pass', '', '');
    });
  }

  onFail(test: TestCaseRef, detail: unknown): void {
    this.guard('fail', () => {
      const execution = this.executionFor(test, 'fail');
      if (execution) this.emit(execution, 'fail', '', formatFailure(detail));
    });
  }

  onError(test: TestCaseRef, detail: unknown): void {
    this.guard('error', () => {
      const execution = this.executionFor(test, 'error');
      if (execution) this.emit(execution, 'error', '', formatFailure(detail));
    });
  }

  onSkip(test: TestCaseRef, reason: string): void {
    this.guard('skip', () => {
      const execution = this.executionFor(test, 'skip');
      if (execution) this.emit(execution, 'skip', '', `Skipped: ${reason}`);
    });
  }

  onSubResult(test: TestCaseRef, subtest: string, outcome?: SubResultFailure | null): void {
    this.guard('subResult', () => {
      const execution = this.executionFor(test, 'subResult');
      if (!execution) return;
      // Any sub-result, passed or not, stands in for the test's own pass.
      execution.hasSubResults = true;

      if (!outcome) {
        this.emit(execution, 'pass', `\n${SUBTEST_LABELS.pass}: ${subtest}`, '', subtest);
        return;
      }

      const status: TestStatus = outcome.kind === 'failure' ? 'fail' : 'error';
      this.emit(
        execution,
        status,
        `\n${SUBTEST_LABELS[outcome.kind]}: ${subtest}`,
        formatFailure(outcome.detail),
        subtest,
      );
    });
  }

  onStop(test: TestCaseRef): void {
    this.guard('stop', () => {
      if (this.executionFor(test, 'stop')) this.closeCurrent();
    });
  }

  /** Routes a recorded lifecycle event to its hook. */
  dispatch(event: LifecycleEvent): void {
    const type: string = event.type;
    switch (event.type) {
      case 'runStart':
        return this.onRunStart();
      case 'runStop':
        return this.onRunStop();
      case 'start':
        return this.onStart(event.test);
      case 'pass':
        return this.onPass(event.test);
      case 'fail':
        return this.onFail(event.test, event.detail);
      case 'error':
        return this.onError(event.test, event.detail);
      case 'skip':
        return this.onSkip(event.test, event.reason);
      case 'subResult':
        return this.onSubResult(event.test, event.subtest, event.outcome);
      case 'stop':
        return this.onStop(event.test);
      default:
        this.ignored += 1;
        this.warn(`ignoring unknown event "${type}"`);
    }
  }

  /** Releases the capture of a test that never reported `stop`. */
  endOpenTest(): void {
    if (!this.current) return;
    this.warn(`${this.current.test.id} never stopped`);
    this.closeCurrent();
  }

  toSummary(): SummaryExport {
    return {
      total: this.totalCount,
      ...this.counts,
      passRate: percentPassed(this.tally),
    };
  }

  private executionFor(test: TestCaseRef, event: string): Execution | undefined {
    if (this.current && this.current.test.id === test.id) return this.current;
    this.ignored += 1;
    this.warn(`ignoring "${event}" for ${test.id}: test was not started`);
    return undefined;
  }

  private emit(
    execution: Execution,
    status: TestStatus,
    outputSuffix: string,
    detail: string,
    subtest?: string,
  ): void {
    const { output, elapsed } = execution.capture.snapshot();
    const record: ResultRecord = Object.freeze({
      status,
      test: execution.test,
      output: output + outputSuffix,
      detail,
      duration: elapsed,
    });
    this.records.push(record);
    this.tally[status] += 1;
    this.logStatus(status, subtest ? `${execution.test.id} [${subtest}]` : execution.test.id);
  }

  private closeCurrent(): void {
    this.current?.capture.release();
    this.current = null;
  }

  private logStatus(status: TestStatus, label: string): void {
    if (this.verbosity <= 0) return;
    const marker = STATUS_MARKERS[status];
    this.capture.writeOriginal('stderr', this.verbosity > 1 ? `${marker}  ${label}\n` : marker);
  }

  private warn(message: string): void {
    this.capture.writeOriginal('stderr', `[runsheet] ${message}\n`);
  }

  private guard(event: string, handler: () => void): void {
    try {
      handler();
    } catch (error) {
      this.ignored += 1;
      const message = error instanceof Error ? error.message : String(error);
      this.warn(`"${event}" handler failed: ${message}`);
    }
  }
}
