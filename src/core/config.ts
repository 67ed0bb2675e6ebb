import { normalizeLanguage, text } from './i18n';
import { ConfigError, formatIssues } from './errors';
import { ReportConfigSchema } from './schema';
import type { ReportConfig, ReportConfigInput } from './types';

/**
 * Validates caller options, fills defaults and resolves the localized title.
 * Unsupported languages fall back to the default locale.
 */
export function resolveReportConfig(input: ReportConfigInput = {}): ReportConfig {
  const result = ReportConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${formatIssues(result.error.issues)}`);
  }

  const language = normalizeLanguage(result.data.language);
  return Object.freeze({
    ...result.data,
    language,
    title: result.data.title ?? text('title', language),
  });
}
