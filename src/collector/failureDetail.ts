/**
 * Renders whatever an engine reports as a failure into report text.
 * Errors keep their stack; causes are appended.
 */
export function formatFailure(detail: unknown): string {
  if (detail instanceof Error) {
    const head = detail.stack ?? `${detail.name}: ${detail.message}`;
    if (detail.cause === undefined) return head;
    return `${head}\nCaused by: ${formatFailure(detail.cause)}`;
  }
  if (typeof detail === 'string') return detail;
  if (detail === null || detail === undefined) return '';
  try {
    return JSON.stringify(detail, null, 2) ?? String(detail);
  } catch {
    return String(detail);
  }
}
