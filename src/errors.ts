export class AuditError extends Error {
  readonly executionRef: string | null;

  constructor(message: string, executionRef: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.executionRef = executionRef;
  }
}

export class LookupError extends AuditError {}

/** A field needed to derive parent, granule or descriptive metadata was absent or malformed. */
export class EnrichmentError extends AuditError {}

export class BackfillError extends AuditError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof AuditError) return `${error.name}: ${error.message}`;
  return errorMessage(error);
}

export function toLookupError(error: unknown, context: string, executionRef: string | null = null): LookupError {
  if (error instanceof LookupError) return error;
  return new LookupError(`${context}: ${errorMessage(error)}`, executionRef, { cause: error });
}

export function assertLookupHealth(
  stage: string,
  failures: number,
  total: number,
  threshold: number
): void {
  if (total === 0 || failures === 0) return;
  if (failures / total > threshold) {
    throw new LookupError(
      `${stage}: ${failures} of ${total} lookups failed (threshold ${Math.round(threshold * 100)}%)`
    );
  }
}
