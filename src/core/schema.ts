import { z } from 'zod';

import { SUPPORTED_LANGUAGES } from './i18n';

const nonEmptyString = z.string().trim().min(1, 'Value cannot be empty');

export const TestGroupSchema = z.object({
  /** Stable identity of the group, e.g. a module-qualified suite name */
  id: nonEmptyString,
  /** Display name */
  name: nonEmptyString,
  /** First line of the group's doc comment */
  description: z.string().optional(),
});

export const TestCaseSchema = z.object({
  /** Stable qualified name, unique within a run */
  id: nonEmptyString,
  name: nonEmptyString,
  description: z.string().optional(),
  group: TestGroupSchema,
});

export const SubResultOutcomeSchema = z.object({
  kind: z.enum(['failure', 'error']),
  detail: z.string(),
});

const at = z.number().int().nonnegative().optional();

export const TestEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('runStart'), at }),
  z.object({ type: z.literal('runStop'), at }),
  z.object({ type: z.literal('start'), test: TestCaseSchema, at }),
  z.object({ type: z.literal('pass'), test: TestCaseSchema, at }),
  z.object({ type: z.literal('fail'), test: TestCaseSchema, detail: z.string(), at }),
  z.object({ type: z.literal('error'), test: TestCaseSchema, detail: z.string(), at }),
  z.object({ type: z.literal('skip'), test: TestCaseSchema, reason: z.string(), at }),
  z.object({
    type: z.literal('subResult'),
    test: TestCaseSchema,
    subtest: nonEmptyString,
    outcome: SubResultOutcomeSchema.nullable().optional(),
    at,
  }),
  z.object({ type: z.literal('stop'), test: TestCaseSchema, at }),
  z.object({
    type: z.literal('output'),
    stream: z.enum(['stdout', 'stderr']).default('stdout'),
    text: z.string(),
    at,
  }),
]);

/**
 * Report configuration, as accepted from runsheet.config.yaml or the API.
 * `language` stays a free string here; unsupported codes fall back to the
 * default locale when the config is resolved.
 */
export const ReportConfigSchema = z.object({
  /** Report title; defaults to the localized "Test Report" */
  title: z.string().optional().describe('Report title'),
  /** Free text shown under the statistic cards */
  description: z.string().default('').describe('Free text shown under the statistic cards'),
  /** Name shown on the tester card and in the footer */
  tester: z.string().default('QA Team').describe('Name shown on the tester card and in the footer'),
  /** Display language code */
  language: z.string().trim().min(1).default('en-US')
    .describe(`Display language code (${SUPPORTED_LANGUAGES.join(', ')})`),
  /** Initial colour theme */
  theme: z.enum(['light', 'dark']).default('light').describe('Initial colour theme'),
  /** Height of the summary chart in pixels */
  chartHeight: z.number().int().positive().default(400).describe('Height of the summary chart in pixels'),
  /** Include passing tests when a group's detail rows are expanded */
  showPassCasesByDefault: z.boolean().default(true)
    .describe('Include passing tests when a group\'s detail rows are expanded'),
}).describe('runsheet report configuration');
