import fs from 'node:fs/promises';
import path from 'node:path';

import { ReportSinkError } from '../core/errors';
import type { ReportSink } from './types';

/** Writes the document to a file, creating parent directories. */
export const fileSink = (outputPath: string): ReportSink => ({
  async write(document) {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, document, 'utf8');
  },
});

export const streamSink = (stream: NodeJS.WritableStream): ReportSink => ({
  write: (document) =>
    new Promise<void>((resolve, reject) => {
      stream.write(document, (error?: Error | null) => (error ? reject(error) : resolve()));
    }),
});

/** Keeps documents in memory; handy for tests and for embedding the report elsewhere. */
export class MemorySink implements ReportSink {
  readonly documents: string[] = [];

  write(document: string): void {
    this.documents.push(document);
  }

  get last(): string | undefined {
    return this.documents.at(-1);
  }
}

/** Single write to the sink; failures surface as {@link ReportSinkError}. */
export async function writeToSink(sink: ReportSink, document: string, subject: string): Promise<void> {
  try {
    await sink.write(document);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReportSinkError(`Failed to write ${subject}: ${message}`, { cause: error });
  }
}
