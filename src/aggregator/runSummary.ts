import { percentPassed, totalOf } from '../core/status';
import type { ResultSource, RunSummary } from '../core/types';

export function summarizeRun(source: ResultSource): RunSummary {
  const counts = { ...source.counts };
  return {
    counts,
    total: totalOf(counts),
    startedAt: source.startedAt,
    stoppedAt: source.stoppedAt,
    passRate: percentPassed(counts),
  };
}
