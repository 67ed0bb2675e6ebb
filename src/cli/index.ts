#!/usr/bin/env node
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import { SUPPORTED_LANGUAGES } from '../core/i18n';
import { loadEventStream, loadReportConfig, loadReportConfigInput } from '../core/loader';
import type { ReportConfigInput } from '../core/types';
import { generateHtmlReport } from '../reporter/htmlReporter';
import { generateJsonReport } from '../reporter/jsonReporter';
import { fileSink } from '../reporter/sinks';
import { replayEvents } from '../replay';
import { configOverrides, parseFlags, type Flags } from './flags';

const CONFIG_FILENAME = 'runsheet.config.yaml';
const DEFAULT_OUTPUT = 'runsheet-report.html';

const logError = (message: string): void => {
  console.error(`Error: ${message}`);
};

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

const writeFileIfMissing = async (filePath: string, contents: string): Promise<boolean> => {
  if (await fileExists(filePath)) return false;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, 'utf8');
  return true;
};

const initCommand = async (): Promise<void> => {
  const configTemplate = `# title: Test Report
description: ""
tester: QA Team
language: en-US
theme: light
chartHeight: 400
showPassCasesByDefault: true
`;

  const created = await writeFileIfMissing(path.resolve(CONFIG_FILENAME), configTemplate);
  console.log(created ? `Initialized ${CONFIG_FILENAME}` : `${CONFIG_FILENAME} already exists`);
};

const validateCommand = async (target: string): Promise<void> => {
  const absoluteTarget = path.resolve(target);
  await loadReportConfig(absoluteTarget);
  console.log(`✓ ${path.relative(process.cwd(), absoluteTarget)} valid`);
};

const resolveConfig = async (flags: Flags): Promise<ReportConfigInput> => {
  const configPath = typeof flags.config === 'string' ? flags.config : CONFIG_FILENAME;
  const hasConfigFile = await fileExists(configPath);
  if (!hasConfigFile && typeof flags.config === 'string') {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const base = hasConfigFile ? await loadReportConfigInput(configPath) : {};
  return { ...base, ...configOverrides(flags) };
};

const renderCommand = async (
  target: string,
  flags: Flags,
): Promise<void> => {
  const absoluteTarget = path.resolve(target);
  const events = await loadEventStream(absoluteTarget);
  const config = await resolveConfig(flags);

  console.log(`Replaying ${events.length} events from ${path.basename(absoluteTarget)}`);
  const collector = replayEvents(events, { verbosity: flags.verbose ? 2 : 1 });
  process.stderr.write('\n');

  const outputPath = path.resolve(typeof flags.output === 'string' ? flags.output : DEFAULT_OUTPUT);
  await generateHtmlReport(collector, config, fileSink(outputPath));
  console.log(`✓ Report written to ${path.relative(process.cwd(), outputPath)}`);

  if (typeof flags.summary === 'string') {
    const summaryPath = path.resolve(flags.summary);
    await generateJsonReport(collector, fileSink(summaryPath));
    console.log(`✓ Summary written to ${path.relative(process.cwd(), summaryPath)}`);
  }

  const summary = collector.toSummary();
  console.log(
    `${summary.total} results: ${summary.pass} passed, ${summary.fail} failed, ` +
      `${summary.error} errors, ${summary.skip} skipped (${summary.passRate}%)`,
  );
  if (collector.ignoredEvents > 0) {
    console.log(`${collector.ignoredEvents} malformed events ignored`);
  }

  if (summary.fail > 0 || summary.error > 0) {
    process.exitCode = 1;
  }
};

const printHelp = (): void => {
  console.log(`Usage: runsheet <command> [options]

Commands:
  init                  Create a default ${CONFIG_FILENAME}
  validate [config]     Validate a config file (default: ${CONFIG_FILENAME})
  render <events.ndjson> [--output=<file>] [--summary=<file>] [--config=<file>]
         [--title=<text>] [--description=<text>] [--tester=<name>]
         [--language=${SUPPORTED_LANGUAGES.join('|')}] [--theme=light|dark] [--verbose]
                        Render a recorded run as an HTML report
`);
};

const main = async (): Promise<void> => {
  const [command, ...rest] = process.argv.slice(2);

  try {
    switch (command) {
      case 'init':
        await initCommand();
        break;
      case 'validate': {
        const target = rest.find((arg) => !arg.startsWith('-')) ?? CONFIG_FILENAME;
        await validateCommand(target);
        break;
      }
      case 'render': {
        const target = rest.find((arg) => !arg.startsWith('-'));
        if (!target) {
          throw new Error('render requires an events file (NDJSON, one event per line)');
        }
        await renderCommand(target, parseFlags(rest));
        break;
      }
      default:
        printHelp();
        if (command) process.exitCode = 1;
        break;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logError(message);
    process.exitCode = 1;
  }
};

void main();
