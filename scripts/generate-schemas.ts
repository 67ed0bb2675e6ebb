/**
 * Generate the JSON Schema of runsheet.config.yaml from its Zod schema
 */
import { writeFileSync, mkdirSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { buildConfigJsonSchema } from '../src/core/jsonSchema';

const __dirname = dirname(fileURLToPath(import.meta.url));
const schemasDir = join(__dirname, '..', 'schemas');

if (!existsSync(schemasDir)) {
  mkdirSync(schemasDir, { recursive: true });
}

const file = 'runsheet.config.schema.json';

try {
  const outputPath = join(schemasDir, file);
  writeFileSync(outputPath, JSON.stringify(buildConfigJsonSchema(), null, 2) + '\n');
  console.log(`✓ Generated ${file}`);
} catch (error) {
  console.error(`✗ Failed to generate ${file}:`, error);
  process.exit(1);
}
