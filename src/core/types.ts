import type { z } from 'zod';

import type {
  ReportConfigSchema,
  TestCaseSchema,
  TestEventSchema,
  TestGroupSchema,
} from './schema';

export type TestStatus = 'pass' | 'fail' | 'error' | 'skip';

export const TEST_STATUSES: readonly TestStatus[] = ['pass', 'fail', 'error', 'skip'];

export type StatusCounts = Record<TestStatus, number>;

export type TestGroupRef = z.infer<typeof TestGroupSchema>;
export type TestCaseRef = z.infer<typeof TestCaseSchema>;
export type TestEvent = z.infer<typeof TestEventSchema>;

export type Theme = z.infer<typeof ReportConfigSchema>['theme'];

/** Fully resolved report options, as consumed by the renderer. */
export type ReportConfig = Readonly<Omit<z.infer<typeof ReportConfigSchema>, 'title'> & { title: string }>;
/** Options as a caller or config file provides them; every field is optional. */
export type ReportConfigInput = z.input<typeof ReportConfigSchema>;

/**
 * One outcome per test or per sub-result. Created frozen by the collector.
 */
export interface ResultRecord {
  readonly status: TestStatus;
  readonly test: TestCaseRef;
  /** Text the test wrote to stdout/stderr up to the event that produced this record. */
  readonly output: string;
  /** Formatted failure, error or skip reason; empty for passes. */
  readonly detail: string;
  /** Seconds since the owning test started, rounded to milliseconds. */
  readonly duration: number;
}

export interface RunSummary {
  counts: StatusCounts;
  total: number;
  startedAt: Date;
  stoppedAt?: Date;
  passRate: number;
}

/** Machine-readable run totals. */
export interface SummaryExport {
  total: number;
  pass: number;
  fail: number;
  error: number;
  skip: number;
  passRate: number;
}

/**
 * What the aggregator and renderers need from a collector.
 */
export interface ResultSource {
  readonly results: readonly ResultRecord[];
  readonly counts: Readonly<StatusCounts>;
  readonly startedAt: Date;
  readonly stoppedAt: Date | undefined;
}
