import { OutputCapture, type WritableChannel } from '../../src/capture';
import { ResultCollector } from '../../src/collector';
import type { ResultRecord, TestCaseRef, TestGroupRef, TestStatus } from '../../src/core/types';
import { ReplayClock } from '../../src/replay';

/** In-memory stand-in for process.stdout / process.stderr. */
export class FakeStream implements WritableChannel {
  readonly chunks: string[] = [];

  write(chunk: string | Uint8Array, ..._args: unknown[]): boolean {
    this.chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export const group = (name: string, description?: string): TestGroupRef => ({
  id: `suite.${name}`,
  name,
  description,
});

export const testCase = (owner: TestGroupRef, name: string, description?: string): TestCaseRef => ({
  id: `${owner.id}.${name}`,
  name,
  description,
  group: owner,
});

export const record = (
  status: TestStatus,
  test: TestCaseRef,
  overrides: Partial<Omit<ResultRecord, 'status' | 'test'>> = {},
): ResultRecord => ({
  status,
  test,
  output: '',
  detail: '',
  duration: 0,
  ...overrides,
});

export const START_MS = new Date(2026, 0, 5, 9, 30, 0).getTime();

export const createHarness = (verbosity = 0) => {
  const clock = new ReplayClock(START_MS);
  const stdout = new FakeStream();
  const stderr = new FakeStream();
  const capture = new OutputCapture({ stdout, stderr, clock });
  const collector = new ResultCollector({ clock, capture, verbosity });
  return { clock, stdout, stderr, capture, collector };
};

/** Runs one test through start → outcome → stop. */
export const runTest = (
  collector: ResultCollector,
  test: TestCaseRef,
  outcome: (collector: ResultCollector, test: TestCaseRef) => void,
): void => {
  collector.onStart(test);
  outcome(collector, test);
  collector.onStop(test);
};
