import fs from 'node:fs/promises';

import type { ZodType } from 'zod';
import { parse } from 'yaml';

import { resolveReportConfig } from './config';
import { ConfigError, EventStreamError, formatIssues } from './errors';
import { ReportConfigSchema, TestEventSchema } from './schema';
import type { ReportConfig, ReportConfigInput, TestEvent } from './types';

const parseWithSchema = <T>(content: string, schema: ZodType<T>, subject: string): T => {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML for ${subject}: ${message}`);
  }

  // An empty file is an empty config.
  const result = schema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid ${subject}: ${formatIssues(result.error.issues)}`);
  }

  return result.data;
};

/** Validated file contents with defaults filled; the title is left for {@link resolveReportConfig}. */
export const parseReportConfigInput = (content: string): ReportConfigInput =>
  parseWithSchema(content, ReportConfigSchema, 'config');

export const parseReportConfig = (content: string): ReportConfig =>
  resolveReportConfig(parseReportConfigInput(content));

export const loadReportConfigInput = async (filePath: string): Promise<ReportConfigInput> => {
  const fileContent = await fs.readFile(filePath, 'utf8');
  return parseReportConfigInput(fileContent);
};

export const loadReportConfig = async (filePath: string): Promise<ReportConfig> =>
  resolveReportConfig(await loadReportConfigInput(filePath));

/**
 * Parses a recorded run: one JSON-encoded event per line, blank lines ignored.
 */
export const parseEventStream = (content: string): TestEvent[] => {
  const events: TestEvent[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new EventStreamError(`invalid JSON (${message})`, index + 1);
    }

    const result = TestEventSchema.safeParse(parsed);
    if (!result.success) {
      throw new EventStreamError(formatIssues(result.error.issues), index + 1);
    }
    events.push(result.data);
  });

  return events;
};

export const loadEventStream = async (filePath: string): Promise<TestEvent[]> => {
  const fileContent = await fs.readFile(filePath, 'utf8');
  return parseEventStream(fileContent);
};
