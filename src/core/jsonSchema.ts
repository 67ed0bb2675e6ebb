import { z } from 'zod';

import { ReportConfigSchema } from './schema';

/** JSON Schema for runsheet.config.yaml, for editor completion and validation. */
export function buildConfigJsonSchema(): Record<string, unknown> {
  return {
    ...z.toJSONSchema(ReportConfigSchema, { io: 'input' }),
    title: 'runsheet Configuration',
  };
}
