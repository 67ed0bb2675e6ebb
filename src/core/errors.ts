interface Issue {
  path: PropertyKey[];
  message: string;
}

/** Flattens schema issues into `path: message; path: message`. */
export const formatIssues = (issues: readonly Issue[]): string =>
  issues
    .map((issue) => {
      const path = issue.path.map(String).join('.') || '<root>';
      return `${path}: ${issue.message}`;
    })
    .join('; ');

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

export class EventStreamError extends Error {
  override readonly name = 'EventStreamError';

  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`Line ${line}: ${message}`);
  }
}

/** The report sink rejected the finished document. Never retried. */
export class ReportSinkError extends Error {
  override readonly name = 'ReportSinkError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CaptureInUseError extends Error {
  override readonly name = 'CaptureInUseError';

  constructor() {
    super('Output is already being captured; release the live capture before acquiring another');
  }
}
