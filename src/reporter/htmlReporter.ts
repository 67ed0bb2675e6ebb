import { groupResults, labelFor, summarizeRun, type GroupSummary } from '../aggregator';
import { resolveReportConfig } from '../core/config';
import { TOOL_NAME, TOOL_VERSION } from '../core/meta';
import { percentPassed } from '../core/status';
import { TEST_STATUSES, type ReportConfigInput, type ResultSource, type RunSummary } from '../core/types';
import { normalizeLanguage, translator, type MessageKey } from '../core/i18n';
import { renderDocument } from './regions';
import { writeToSink } from './sinks';
import { formatDuration, formatRunDuration, formatTimestamp } from './timeUtils';
import type { ReportModel, ReportSink, StatCard, TableRegion, TestRowRegion } from './types';

type Translate = (key: MessageKey) => string;

/** `Pass 3 | Fail 1` over the non-zero counts, or `N/A` for an empty run. */
export function statusSummary(summary: RunSummary, t: Translate): string {
  const parts = TEST_STATUSES.filter((status) => summary.counts[status] > 0).map(
    (status) => `${t(status)} ${summary.counts[status]}`,
  );
  return parts.join(' | ') || 'N/A';
}

const buildTestRows = (group: GroupSummary, t: Translate): TestRowRegion[] =>
  group.rows.map(({ rowId, record }) => {
    const { test, output, detail } = record;
    const body = output || detail ? output + detail : t('noOutput');
    return {
      rowId,
      label: labelFor(test.name, test.description),
      status: record.status,
      statusLabel: t(record.status),
      duration: formatDuration(record.duration),
      content: `${rowId}: ${body}`,
    };
  });

const buildTable = (
  groups: GroupSummary[],
  summary: RunSummary,
  showPassCases: boolean,
  t: Translate,
): TableRegion => ({
  groups: groups.map((group) => ({
    row: {
      id: group.id,
      label: group.label,
      counts: group.counts,
      total: group.total,
      classification: group.classification,
      rowCount: group.rows.length,
    },
    tests: buildTestRows(group, t),
  })),
  totals: { counts: summary.counts, total: summary.total },
  showPassCases,
});

/**
 * Collects everything the document shows into one typed model. Pure: the
 * same source and config always give the same model.
 */
export function buildReportModel(source: ResultSource, options: ReportConfigInput = {}): ReportModel {
  const config = resolveReportConfig(options);
  const language = normalizeLanguage(config.language);
  const t = translator(language);
  const summary = summarizeRun(source);
  const groups = groupResults(source.results);

  const cards: StatCard[] = [
    { label: t('startTime'), value: formatTimestamp(summary.startedAt), tone: 'info', icon: 'bi-clock-history' },
    {
      label: t('duration'),
      value: formatRunDuration(summary.startedAt, summary.stoppedAt),
      tone: 'primary',
      icon: 'bi-stopwatch',
    },
    { label: t('status'), value: statusSummary(summary, t), tone: 'success', icon: 'bi-flag-fill' },
    { label: t('tester'), value: config.tester, tone: 'secondary', icon: 'bi-person-fill' },
  ];

  return {
    language,
    theme: config.theme,
    title: config.title,
    header: {
      title: config.title,
      description: config.description,
      cards,
      chartHeight: config.chartHeight,
    },
    chart: {
      counts: { ...summary.counts },
      passRate: percentPassed(summary.counts, 1),
      labels: {
        title: t('testExecution'),
        passRate: t('passRate'),
        pass: t('pass'),
        fail: t('fail'),
        error: t('error'),
        skip: t('skip'),
      },
    },
    table: buildTable(groups, summary, config.showPassCasesByDefault, t),
    footer: {
      toolName: TOOL_NAME,
      version: TOOL_VERSION,
      tester: config.tester,
      generatedAt: summary.stoppedAt ? formatTimestamp(summary.stoppedAt) : '',
    },
  };
}

export function renderHtmlReport(source: ResultSource, options: ReportConfigInput = {}): string {
  const model = buildReportModel(source, options);
  return renderDocument(model, translator(model.language));
}

/**
 * Renders the run and writes the document to `sink`. A rejected write is
 * raised as a ReportSinkError; nothing is retried.
 */
export async function generateHtmlReport(
  source: ResultSource,
  options: ReportConfigInput,
  sink: ReportSink,
): Promise<void> {
  await writeToSink(sink, renderHtmlReport(source, options), 'HTML report');
}
