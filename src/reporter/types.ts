import type { GroupClassification } from '../aggregator';
import type { StatusCounts, TestStatus, Theme } from '../core/types';
import type { Language } from '../core/i18n';

/**
 * Where a finished document goes. The only I/O boundary of report generation.
 */
export interface ReportSink {
  write(document: string): void | Promise<void>;
}

export type CardTone = 'info' | 'primary' | 'success' | 'secondary';

export interface StatCard {
  label: string;
  value: string;
  tone: CardTone;
  icon: string;
}

export interface HeaderRegion {
  title: string;
  description: string;
  cards: StatCard[];
  chartHeight: number;
}

/** Serialized into the page as JSON and read by the chart script. */
export interface ChartRegion {
  counts: StatusCounts;
  /** Pass percentage, one decimal. */
  passRate: number;
  labels: {
    title: string;
    passRate: string;
  } & Record<TestStatus, string>;
}

export interface GroupRowRegion {
  id: string;
  label: string;
  counts: StatusCounts;
  total: number;
  classification: GroupClassification;
  /** Highest record index in the group, used by the client toggle. */
  rowCount: number;
}

export interface TestRowRegion {
  rowId: string;
  label: string;
  status: TestStatus;
  statusLabel: string;
  duration: string;
  /** `<rowId>: <output><detail>`, unescaped. */
  content: string;
}

export interface TableRegion {
  groups: Array<{ row: GroupRowRegion; tests: TestRowRegion[] }>;
  totals: { counts: StatusCounts; total: number };
  showPassCases: boolean;
}

export interface FooterRegion {
  toolName: string;
  version: string;
  tester: string;
  generatedAt: string;
}

/** Everything needed to write the document; all text is unescaped. */
export interface ReportModel {
  language: Language;
  theme: Theme;
  title: string;
  header: HeaderRegion;
  chart: ChartRegion;
  table: TableRegion;
  footer: FooterRegion;
}
