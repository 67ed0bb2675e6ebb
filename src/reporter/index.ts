export { buildReportModel, generateHtmlReport, renderHtmlReport, statusSummary } from './htmlReporter';
export { generateJsonReport, toSummary } from './jsonReporter';
export { escapeHtml, jsonForScript } from './html';
export { renderDocument } from './regions';
export { MemorySink, fileSink, streamSink } from './sinks';
export { formatDuration, formatElapsed, formatRunDuration, formatTimestamp } from './timeUtils';
export type {
  ChartRegion,
  FooterRegion,
  GroupRowRegion,
  HeaderRegion,
  ReportModel,
  ReportSink,
  StatCard,
  TableRegion,
  TestRowRegion,
} from './types';
