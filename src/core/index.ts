// Export schemas
export {
  ReportConfigSchema,
  SubResultOutcomeSchema,
  TestCaseSchema,
  TestEventSchema,
  TestGroupSchema,
} from './schema';

// Export types
export type {
  ReportConfig,
  ReportConfigInput,
  ResultRecord,
  ResultSource,
  RunSummary,
  StatusCounts,
  SummaryExport,
  TestCaseRef,
  TestEvent,
  TestGroupRef,
  TestStatus,
  Theme,
} from './types';
export { TEST_STATUSES } from './types';

// Export loader and config functions
export {
  loadEventStream,
  loadReportConfig,
  loadReportConfigInput,
  parseEventStream,
  parseReportConfig,
  parseReportConfigInput,
} from './loader';
export { resolveReportConfig } from './config';
export {
  DEFAULT_LANGUAGE,
  SUPPORTED_LANGUAGES,
  isSupportedLanguage,
  normalizeLanguage,
  text,
  translator,
  type Language,
  type MessageKey,
} from './i18n';
export { buildConfigJsonSchema } from './jsonSchema';

export { CaptureInUseError, ConfigError, EventStreamError, ReportSinkError } from './errors';
export { systemClock, type Clock } from './clock';
export { percentPassed } from './status';
export { TOOL_NAME, TOOL_VERSION } from './meta';
