import { summarizeRun } from '../aggregator';
import type { ResultSource, SummaryExport } from '../core/types';
import { writeToSink } from './sinks';
import type { ReportSink } from './types';

export function toSummary(source: ResultSource): SummaryExport {
  const summary = summarizeRun(source);
  return {
    total: summary.total,
    ...summary.counts,
    passRate: summary.passRate,
  };
}

export async function generateJsonReport(source: ResultSource, sink: ReportSink): Promise<void> {
  const json = JSON.stringify(toSummary(source), null, 2);
  await writeToSink(sink, `${json}\n`, 'JSON summary');
}
