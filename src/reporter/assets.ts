/**
 * Static page assets. The report treats these as opaque fragments; only the
 * region renderers produce run-specific markup.
 */

export const EXTERNAL_STYLES = [
  'https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css',
  'https://cdn.jsdelivr.net/npm/bootstrap-icons@1.11.3/font/bootstrap-icons.min.css',
];

export const EXTERNAL_SCRIPTS = [
  'https://cdn.jsdelivr.net/npm/echarts@5.5.1/dist/echarts.min.js',
];

export const STYLESHEET = `
:root {
  --primary: #1890ff;
  --success: #52c41a;
  --warning: #faad14;
  --danger: #f5222d;
  --info: #13c2c2;
  --border: #d9d9d9;
  --text: #262626;
  --text-secondary: #8c8c8c;
  --bg: #f0f2f5;
  --card-bg: #ffffff;
  --table-header-bg: #fafafa;
  --hover-bg: #fafafa;
}

[data-bs-theme="dark"] {
  --primary: #177ddc;
  --success: #49aa19;
  --warning: #d89614;
  --danger: #d32029;
  --border: #434343;
  --text: #e8e8e8;
  --text-secondary: #a6a6a6;
  --bg: #141414;
  --card-bg: #1f1f1f;
  --table-header-bg: #141414;
  --hover-bg: #262626;
}

* {
  box-sizing: border-box;
}

body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', 'PingFang SC', 'Microsoft YaHei', sans-serif;
  background: var(--bg);
  color: var(--text);
  min-height: 100vh;
  margin: 0;
  padding: 24px;
  transition: background-color 0.3s, color 0.3s;
}

.report {
  max-width: 1400px;
  margin: 0 auto;
}

.card-custom {
  background: var(--card-bg);
  border: 1px solid var(--border);
  border-radius: 12px;
  padding: 24px;
  margin-bottom: 20px;
  box-shadow: 0 2px 8px rgba(0, 0, 0, 0.06);
}

.report-title {
  font-size: 28px;
  font-weight: 700;
  color: var(--primary);
  display: flex;
  align-items: center;
  gap: 12px;
  margin-bottom: 20px;
}

.theme-toggle {
  position: fixed;
  top: 24px;
  right: 24px;
  z-index: 1000;
  width: 48px;
  height: 48px;
  border-radius: 50%;
  border: 1px solid var(--border);
  background: var(--card-bg);
  color: var(--text);
  font-size: 20px;
  cursor: pointer;
  box-shadow: 0 4px 12px rgba(0, 0, 0, 0.15);
}

.stats-grid {
  display: grid;
  grid-template-columns: repeat(auto-fit, minmax(220px, 1fr));
  gap: 16px;
  margin-bottom: 20px;
}

.stat-card {
  border-radius: 10px;
  padding: 18px;
  border-left: 4px solid var(--primary);
  background: var(--table-header-bg);
}

.stat-card.info { border-left-color: var(--info); }
.stat-card.success { border-left-color: var(--success); }
.stat-card.secondary { border-left-color: var(--text-secondary); }

.stat-icon {
  font-size: 22px;
  color: var(--primary);
}

.stat-label {
  font-size: 13px;
  color: var(--text-secondary);
  text-transform: uppercase;
  margin-top: 6px;
}

.stat-value {
  font-size: 18px;
  font-weight: 600;
  word-break: break-word;
}

.filter-btn,
.action-btn {
  border: 1px solid var(--border);
  background: var(--card-bg);
  color: var(--text);
  border-radius: 6px;
  padding: 6px 14px;
  cursor: pointer;
  font-size: 14px;
}

.filter-btn.active {
  background: var(--primary);
  border-color: var(--primary);
  color: #fff;
}

#result_table {
  width: 100%;
  border-collapse: collapse;
}

#result_table th {
  background: var(--table-header-bg);
  padding: 12px;
  border-bottom: 2px solid var(--border);
  font-size: 14px;
}

#result_table td {
  padding: 12px;
  border-bottom: 1px solid var(--border);
  vertical-align: top;
}

#result_table tr:hover td {
  background: var(--hover-bg);
}

.passClass td:first-child { border-left: 4px solid var(--success); }
.failClass td:first-child { border-left: 4px solid var(--warning); }
.errorClass td:first-child { border-left: 4px solid var(--danger); }
.skipClass td:first-child { border-left: 4px solid var(--primary); }

.testcase {
  padding-left: 24px;
}

.failCase .testcase { color: var(--warning); }
.errorCase .testcase { color: var(--danger); }
.skipCase .testcase { color: var(--primary); }

.duration {
  color: var(--text-secondary);
  font-size: 12px;
  margin-left: 8px;
}

.popup_window {
  display: none;
  margin-top: 12px;
  border: 1px solid var(--border);
  border-radius: 8px;
  overflow: hidden;
  text-align: left;
}

.popup_window_header {
  display: flex;
  justify-content: space-between;
  align-items: center;
  padding: 10px 14px;
  background: var(--table-header-bg);
  border-bottom: 1px solid var(--border);
}

.popup_window_content pre {
  margin: 0;
  padding: 14px;
  max-height: 480px;
  overflow: auto;
  white-space: pre-wrap;
  word-break: break-word;
  font-family: 'JetBrains Mono', 'Courier New', monospace;
  font-size: 13px;
  color: var(--text);
}

.footer-card {
  text-align: center;
}

@media (max-width: 768px) {
  body {
    padding: 10px;
  }

  .theme-toggle {
    top: 12px;
    right: 12px;
  }

  .stats-grid {
    grid-template-columns: 1fr;
  }
}
`;

export const CLIENT_SCRIPT = `
const ThemeManager = {
  key: 'runsheet-theme',
  init() {
    const rendered = document.documentElement.getAttribute('data-bs-theme') || 'light';
    // Toggles are remembered per report file and per rendered theme.
    this.key = 'runsheet-theme:' + location.pathname + ':' + rendered;
    this.setTheme(localStorage.getItem(this.key) || rendered, false);
  },
  toggle() {
    const current = document.documentElement.getAttribute('data-bs-theme');
    this.setTheme(current === 'dark' ? 'light' : 'dark');
  },
  setTheme(theme, remember = true) {
    document.documentElement.setAttribute('data-bs-theme', theme);
    if (remember) localStorage.setItem(this.key, theme);
    const icon = document.getElementById('theme-icon');
    if (icon) icon.className = theme === 'dark' ? 'bi bi-sun-fill' : 'bi bi-moon-stars-fill';
    if (window.initChart) window.initChart();
  }
};

function hideDetail(rowId) {
  const panel = document.getElementById('div_' + rowId);
  if (panel) panel.style.display = 'none';
}

function showPassCases() {
  const table = document.getElementById('result_table');
  return !table || table.dataset.showPass !== 'false';
}

// 0 = summary only, 1 = failures and errors, 2 = everything
function showCase(level) {
  document.querySelectorAll('tr[data-test-row]').forEach((row) => {
    const prefix = row.id.substring(0, 2);
    const show = level === 2 || (level === 1 && prefix === 'ft');
    row.style.display = show ? 'table-row' : 'none';
    if (!show) hideDetail(row.id);
  });
  document.querySelectorAll('.filter-btn').forEach((button, index) => {
    button.classList.toggle('active', index === level);
  });
}

function showClassDetail(groupId, count) {
  const group = groupId.substring(1);
  const includePass = showPassCases();
  const rows = [];
  for (let i = 1; i <= count; i++) {
    for (const prefix of ['pt', 'ft', 'st']) {
      const row = document.getElementById(prefix + group + '.' + i);
      if (row) rows.push(row);
    }
  }
  const eligible = (row) => includePass || !row.id.startsWith('pt');
  const expand = rows.some((row) => eligible(row) && row.style.display !== 'table-row');
  rows.forEach((row) => {
    const show = expand && eligible(row);
    row.style.display = show ? 'table-row' : 'none';
    if (!show) hideDetail(row.id);
  });
}

function showTestDetail(panelId) {
  const panel = document.getElementById(panelId);
  if (panel) panel.style.display = panel.style.display === 'block' ? 'none' : 'block';
}

function copyTestDetail(contentId, button) {
  const content = document.getElementById(contentId);
  if (!content || !navigator.clipboard) return;
  navigator.clipboard.writeText(content.textContent || '').then(() => {
    const original = button.innerHTML;
    button.textContent = button.dataset.copied || 'Copied';
    setTimeout(() => { button.innerHTML = original; }, 1500);
  });
}

document.addEventListener('DOMContentLoaded', () => ThemeManager.init());
`;

export const CHART_SCRIPT = `
window.initChart = function () {
  const chartDom = document.getElementById('chart');
  const source = document.getElementById('chart-data');
  if (!chartDom || !source || !window.echarts) return;

  const existing = echarts.getInstanceByDom(chartDom);
  if (existing) existing.dispose();

  const data = JSON.parse(source.textContent);
  const isDark = document.documentElement.getAttribute('data-bs-theme') === 'dark';
  const text = isDark ? '#e8e8e8' : '#262626';
  const muted = isDark ? '#a6a6a6' : '#8c8c8c';
  const chart = echarts.init(chartDom);

  chart.setOption({
    title: {
      text: data.labels.title,
      subtext: data.labels.passRate + ': ' + data.passRate + '%',
      left: 'center',
      top: '5%',
      textStyle: { fontSize: 18, fontWeight: 600, color: text },
      subtextStyle: { fontSize: 14, color: muted }
    },
    tooltip: { trigger: 'item', formatter: '{b}: {c} ({d}%)' },
    legend: { bottom: '5%', textStyle: { color: text } },
    series: [{
      name: 'Result',
      type: 'pie',
      radius: ['45%', '70%'],
      itemStyle: { borderRadius: 8, borderColor: isDark ? '#141414' : '#fff', borderWidth: 3 },
      label: {
        color: text,
        formatter: (p) => (p.value === 0 ? '' : p.name + '\\n' + p.value + ' (' + p.percent + '%)')
      },
      data: [
        { value: data.counts.pass, name: data.labels.pass, itemStyle: { color: '#52c41a' } },
        { value: data.counts.fail, name: data.labels.fail, itemStyle: { color: '#faad14' } },
        { value: data.counts.error, name: data.labels.error, itemStyle: { color: '#f5222d' } },
        { value: data.counts.skip, name: data.labels.skip, itemStyle: { color: '#1890ff' } }
      ]
    }]
  });
};

window.addEventListener('resize', () => {
  const chartDom = document.getElementById('chart');
  const chart = chartDom && window.echarts ? echarts.getInstanceByDom(chartDom) : undefined;
  if (chart) chart.resize();
});

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', window.initChart);
} else {
  window.initChart();
}
`;
