import type { TestStatus } from '../core/types';
import { CHART_SCRIPT, CLIENT_SCRIPT, EXTERNAL_SCRIPTS, EXTERNAL_STYLES, STYLESHEET } from './assets';
import { escapeHtml, jsonForScript } from './html';
import type { MessageKey } from '../core/i18n';
import type {
  ChartRegion,
  FooterRegion,
  GroupRowRegion,
  HeaderRegion,
  ReportModel,
  StatCard,
  TableRegion,
  TestRowRegion,
} from './types';

type Translate = (key: MessageKey) => string;

const TEST_ROW_CLASSES: Record<TestStatus, string> = {
  pass: 'none',
  fail: 'failCase',
  error: 'errorCase',
  skip: 'skipCase',
};

export function renderStatCard(card: StatCard): string {
  return `
<div class="stat-card ${card.tone}">
  <i class="bi ${card.icon} stat-icon"></i>
  <div class="stat-label">${escapeHtml(card.label)}</div>
  <div class="stat-value">${escapeHtml(card.value)}</div>
</div>`;
}

export function renderHeader(header: HeaderRegion, t: Translate): string {
  return `
<button class="theme-toggle" onclick="ThemeManager.toggle()" title="${escapeHtml(t('toggleTheme'))}">
  <i class="bi bi-moon-stars-fill" id="theme-icon"></i>
</button>

<div class="card-custom">
  <h1 class="report-title">
    <i class="bi bi-clipboard-data-fill"></i>
    ${escapeHtml(header.title)}
  </h1>
  <div class="stats-grid">
    ${header.cards.map(renderStatCard).join('')}
  </div>
  <p class="text-muted mb-0">${escapeHtml(header.description)}</p>
</div>

<div class="card-custom">
  <div id="chart" style="width:100%;height:${header.chartHeight}px;"></div>
</div>`;
}

export function renderChartData(chart: ChartRegion): string {
  return `<script type="application/json" id="chart-data">${jsonForScript(chart)}</script>`;
}

const countCells = (row: { counts: GroupRowRegion['counts']; total: number }): string => `
  <td class="text-center">${row.total}</td>
  <td class="text-center"><span class="badge bg-success">${row.counts.pass}</span></td>
  <td class="text-center"><span class="badge bg-warning">${row.counts.fail}</span></td>
  <td class="text-center"><span class="badge bg-danger">${row.counts.error}</span></td>
  <td class="text-center"><span class="badge bg-primary">${row.counts.skip}</span></td>`;

export function renderGroupRow(row: GroupRowRegion, t: Translate): string {
  return `
<tr class="${row.classification}Class" id="${row.id}">
  <td><strong><i class="bi bi-folder-fill"></i> ${escapeHtml(row.label)}</strong></td>${countCells(row)}
  <td class="text-center">
    <button class="action-btn" onclick="showClassDetail('${row.id}', ${row.rowCount})">
      <i class="bi bi-chevron-down"></i> ${escapeHtml(t('detail'))}
    </button>
  </td>
</tr>`;
}

export function renderTestRow(row: TestRowRegion, t: Translate): string {
  const panelId = `div_${row.rowId}`;
  const contentId = `content_${row.rowId}`;
  return `
<tr id="${row.rowId}" data-test-row style="display:none;">
  <td class="${TEST_ROW_CLASSES[row.status]}">
    <div class="testcase">
      <i class="bi bi-file-earmark-code"></i> ${escapeHtml(row.label)}<span class="duration">${escapeHtml(row.duration)}</span>
    </div>
  </td>
  <td colspan="6">
    <div class="text-center">
      <button class="action-btn" onclick="showTestDetail('${panelId}')">
        <i class="bi bi-info-circle"></i> ${escapeHtml(row.statusLabel)}
      </button>
    </div>
    <div id="${panelId}" class="popup_window">
      <div class="popup_window_header">
        <strong><i class="bi bi-terminal"></i> ${escapeHtml(t('executionDetails'))}</strong>
        <div>
          <button class="action-btn" data-copied="${escapeHtml(t('copied'))}" onclick="copyTestDetail('${contentId}', this)">
            <i class="bi bi-clipboard"></i> ${escapeHtml(t('copy'))}
          </button>
          <button class="action-btn" title="${escapeHtml(t('close'))}" onclick="showTestDetail('${panelId}')">
            <i class="bi bi-x-lg"></i>
          </button>
        </div>
      </div>
      <div class="popup_window_content">
        <pre id="${contentId}">${escapeHtml(row.content)}</pre>
      </div>
    </div>
  </td>
</tr>`;
}

export function renderTotalsRow(totals: TableRegion['totals'], t: Translate): string {
  return `
<tr class="totals-row">
  <td><i class="bi bi-calculator"></i> ${escapeHtml(t('totalSummary'))}</td>${countCells(totals)}
  <td>&nbsp;</td>
</tr>`;
}

export function renderTable(table: TableRegion, t: Translate): string {
  const rows = table.groups
    .map(({ row, tests }) => renderGroupRow(row, t) + tests.map((test) => renderTestRow(test, t)).join(''))
    .join('');
  const heading = (icon: string, key: MessageKey): string =>
    `<th class="text-center"><i class="bi ${icon}"></i> ${escapeHtml(t(key))}</th>`;

  return `
<div class="card-custom table-card">
  <div class="d-flex justify-content-between align-items-center mb-4 flex-wrap gap-3">
    <h2 class="mb-0"><i class="bi bi-list-check"></i> ${escapeHtml(t('testDetails'))}</h2>
    <div class="btn-group" role="group">
      <button class="filter-btn active" onclick="showCase(0)"><i class="bi bi-clipboard-data"></i> ${escapeHtml(t('summary'))}</button>
      <button class="filter-btn" onclick="showCase(1)"><i class="bi bi-exclamation-triangle"></i> ${escapeHtml(t('failed'))}</button>
      <button class="filter-btn" onclick="showCase(2)"><i class="bi bi-list-ul"></i> ${escapeHtml(t('all'))}</button>
    </div>
  </div>
  <div class="table-responsive">
    <table id="result_table" data-show-pass="${table.showPassCases}">
      <thead>
        <tr>
          <th><i class="bi bi-folder2-open"></i> ${escapeHtml(t('testSuite'))}</th>
          ${heading('bi-hash', 'total')}
          ${heading('bi-check-circle', 'pass')}
          ${heading('bi-x-circle', 'fail')}
          ${heading('bi-exclamation-circle', 'error')}
          ${heading('bi-dash-circle', 'skip')}
          ${heading('bi-eye', 'view')}
        </tr>
      </thead>
      <tbody>
        ${rows}
        ${renderTotalsRow(table.totals, t)}
      </tbody>
    </table>
  </div>
</div>`;
}

export function renderFooter(footer: FooterRegion, t: Translate): string {
  return `
<div class="card-custom footer-card">
  <p class="text-muted mb-2"><i class="bi bi-code-square"></i> ${escapeHtml(t('poweredBy'))} ${escapeHtml(footer.toolName)} v${escapeHtml(footer.version)}</p>
  <p class="text-muted mb-2"><i class="bi bi-person-circle"></i> ${escapeHtml(footer.tester)}</p>
  <p class="text-muted mb-0"><i class="bi bi-calendar3"></i> ${escapeHtml(t('generatedOn'))} ${escapeHtml(footer.generatedAt)}</p>
</div>`;
}

export function renderDocument(model: ReportModel, t: Translate): string {
  const styles = EXTERNAL_STYLES.map((href) => `<link href="${href}" rel="stylesheet">`).join('\n  ');
  const scripts = EXTERNAL_SCRIPTS.map((src) => `<script src="${src}"></script>`).join('\n  ');

  return `<!DOCTYPE html>
<html lang="${model.language}" data-bs-theme="${model.theme}">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta name="generator" content="${escapeHtml(model.footer.toolName)} ${escapeHtml(model.footer.version)}">
  <title>${escapeHtml(model.title)}</title>
  ${styles}
  ${scripts}
  <style>${STYLESHEET}</style>
</head>
<body>
  <script>${CLIENT_SCRIPT}</script>
  <div class="report">
    ${renderHeader(model.header, t)}
    ${renderTable(model.table, t)}
    ${renderFooter(model.footer, t)}
  </div>
  ${renderChartData(model.chart)}
  <script>${CHART_SCRIPT}</script>
</body>
</html>
`;
}
