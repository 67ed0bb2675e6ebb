import { describe, expect, it } from 'vitest';

import { translator } from '../src/core';
import { ConfigError, ReportSinkError } from '../src/core/errors';
import { emptyCounts } from '../src/core/status';
import type { ResultSource } from '../src/core/types';
import {
  buildReportModel,
  generateHtmlReport,
  MemorySink,
  renderHtmlReport,
  statusSummary,
} from '../src/reporter';
import { summarizeRun } from '../src/aggregator';
import { createHarness, group, runTest, START_MS, testCase } from './helpers/fixtures';

const buildRun = (text = { group: 'MathTests', test: 'test_add', output: 'hello\n' }) => {
  const { clock, stdout, collector } = createHarness();
  const math = group(text.group, 'Arithmetic');
  const strings = group('StringTests');

  runTest(collector, testCase(math, text.test, 'adds numbers'), (c, t) => {
    stdout.write(text.output);
    c.onPass(t);
  });
  runTest(collector, testCase(math, 'test_div'), (c, t) => c.onError(t, 'ZeroDivisionError'));
  runTest(collector, testCase(strings, 'test_upper'), (c, t) => c.onPass(t));
  runTest(collector, testCase(strings, 'test_split'), (c, t) => c.onSkip(t, 'flaky'));
  clock.set(START_MS + 1_500);
  collector.onRunStop();
  return collector;
};

const emptyRun: ResultSource = {
  results: [],
  counts: emptyCounts(),
  startedAt: new Date(START_MS),
  stoppedAt: undefined,
};

describe('statusSummary', () => {
  const t = translator('en-US');

  it('lists the non-zero counts', () => {
    expect(statusSummary(summarizeRun(buildRun()), t)).toBe('Pass 2 | Error 1 | Skip 1');
  });

  it('falls back to N/A for an empty run', () => {
    expect(statusSummary(summarizeRun(emptyRun), t)).toBe('N/A');
  });
});

describe('buildReportModel', () => {
  it('fills the header cards', () => {
    const model = buildReportModel(buildRun());

    expect(model.header.cards.map((card) => [card.label, card.value])).toEqual([
      ['Start Time', '2026-01-05 09:30:00'],
      ['Duration', '0:00:01.500'],
      ['Status', 'Pass 2 | Error 1 | Skip 1'],
      ['Tester', 'QA Team'],
    ]);
    expect(model.title).toBe('Test Report');
    expect(model.footer.generatedAt).toBe('2026-01-05 09:30:01');
  });

  it('builds test rows with localized status and output', () => {
    const model = buildReportModel(buildRun());
    const [math, strings] = model.table.groups;

    expect(math?.row).toMatchObject({ id: 'c1', label: 'MathTests: Arithmetic', classification: 'error' });
    expect(math?.tests.map((row) => [row.rowId, row.label, row.statusLabel, row.content])).toEqual([
      ['pt1.1', 'test_add: adds numbers', 'Pass', 'pt1.1: hello\n'],
      ['ft1.2', 'test_div', 'Error', 'ft1.2: ZeroDivisionError'],
    ]);
    expect(strings?.tests.map((row) => row.content)).toEqual(['pt2.1: No output', 'st2.2: Skipped: flaky']);
  });

  it('labels tests with the first line of their description', () => {
    const { collector } = createHarness();
    const math = group('MathTests');
    runTest(collector, testCase(math, 'test_mul', 'multiplies\nwith a long explanation'), (c, t) => c.onPass(t));
    runTest(collector, testCase(math, 'test_neg', '   \nonly the second line'), (c, t) => c.onPass(t));

    const [first, second] = buildReportModel(collector).table.groups[0]?.tests ?? [];

    expect(first?.label).toBe('test_mul: multiplies');
    expect(second?.label).toBe('test_neg');
  });

  it('rounds the chart pass rate to one place', () => {
    const { collector } = createHarness();
    const math = group('MathTests');
    runTest(collector, testCase(math, 'a'), (c, t) => c.onPass(t));
    runTest(collector, testCase(math, 'b'), (c, t) => c.onPass(t));
    runTest(collector, testCase(math, 'c'), (c, t) => c.onFail(t, 'no'));

    expect(buildReportModel(collector).chart.passRate).toBe(66.7);
  });

  it('renders an empty run', () => {
    const model = buildReportModel(emptyRun);

    expect(model.table.groups).toEqual([]);
    expect(model.header.cards[1]?.value).toBe('0:00:00');
    expect(model.header.cards[2]?.value).toBe('N/A');
    expect(model.footer.generatedAt).toBe('');
  });

  it('localizes labels and the default title', () => {
    const model = buildReportModel(buildRun(), { language: 'zh-CN' });

    expect(model.title).toBe('测试报告');
    expect(model.header.cards[0]?.label).toBe('开始时间');
    expect(model.table.groups[0]?.tests[0]?.statusLabel).toBe('通过');
  });

  it('falls back to English for unsupported languages', () => {
    const model = buildReportModel(buildRun(), { language: 'fr-FR' });

    expect(model.language).toBe('en-US');
    expect(model.title).toBe('Test Report');
  });

  it('rejects invalid options', () => {
    expect(() => buildReportModel(emptyRun, { chartHeight: -1 })).toThrow(ConfigError);
  });
});

describe('renderHtmlReport', () => {
  it('emits the document shell and row ids', () => {
    const html = renderHtmlReport(buildRun(), { theme: 'dark', title: 'Nightly' });

    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en-US" data-bs-theme="dark">')).toBe(true);
    expect(html).toContain('<title>Nightly</title>');
    expect(html).toContain('<tr class="errorClass" id="c1">');
    expect(html).toContain('<tr id="st2.2" data-test-row style="display:none;">');
    expect(html).toContain('<pre id="content_ft1.2">ft1.2: ZeroDivisionError</pre>');
    expect(html).toContain('<table id="result_table" data-show-pass="true">');
  });

  it('escapes text from test names, output and options', () => {
    const html = renderHtmlReport(
      buildRun({ group: 'G<1>', test: 'a&b', output: '</pre><script>alert(1)</script>' }),
      { title: '"quoted" <b>', tester: "O'Neil" },
    );

    expect(html).toContain('<title>&quot;quoted&quot; &lt;b&gt;</title>');
    expect(html).toContain('<pre id="content_pt1.1">pt1.1: &lt;/pre&gt;&lt;script&gt;alert(1)&lt;/script&gt;</pre>');
    expect(html).toContain('<strong><i class="bi bi-folder-fill"></i> G&lt;1&gt;: Arithmetic</strong>');
    expect(html).toContain('<div class="stat-value">O&#39;Neil</div>');
  });

  it('keeps the same markup structure whatever the text', () => {
    const tags = (html: string): number => (html.match(/</g) ?? []).length;
    const benign = renderHtmlReport(buildRun(), { title: 'Report' });
    const hostile = renderHtmlReport(
      buildRun({ group: '<tr><td>', test: '</td></tr>', output: '<div><pre>' }),
      { title: '</title><script>' },
    );

    expect(tags(hostile)).toBe(tags(benign));
  });

  it('hides passing rows on expand when configured', () => {
    const html = renderHtmlReport(buildRun(), { showPassCasesByDefault: false });

    expect(html).toContain('<table id="result_table" data-show-pass="false">');
  });

  it('embeds chart data that cannot close its script element', () => {
    const html = renderHtmlReport(buildRun());
    const island = /<script type="application\/json" id="chart-data">(.*?)<\/script>/.exec(html);

    expect(island).not.toBeNull();
    expect(JSON.parse(island?.[1] ?? '{}')).toMatchObject({
      counts: { pass: 2, fail: 0, error: 1, skip: 1 },
      passRate: 50,
    });
  });
});

describe('generateHtmlReport', () => {
  it('writes the document to the sink once', async () => {
    const sink = new MemorySink();
    const run = buildRun();

    await generateHtmlReport(run, {}, sink);

    expect(sink.documents).toHaveLength(1);
    expect(sink.last).toBe(renderHtmlReport(run));
  });

  it('wraps sink failures', async () => {
    const cause = new Error('disk full');
    const failing = {
      write: async () => {
        throw cause;
      },
    };

    const result = generateHtmlReport(emptyRun, {}, failing);

    await expect(result).rejects.toThrow(ReportSinkError);
    await expect(result).rejects.toMatchObject({
      message: 'Failed to write HTML report: disk full',
      cause,
    });
  });
});
