/**
 * Application Errors
 * ==================
 *
 * Every error that crosses a module boundary extends AppError so the
 * HTTP layer can map it to { ok: false, error: code, message }.
 */

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ═══════════════════════════════════════════════════════════════
// RECORD / NORMALIZATION
// ═══════════════════════════════════════════════════════════════

export class RecordValidationError extends AppError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('RECORD_INVALID', message, 400);
  }
}

/**
 * Raw payload is missing identity fields or is structurally malformed.
 * Local to one payload: batches report it per item.
 */
export class NormalizationError extends AppError {
  readonly instrument?: string;

  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown; code?: string }
  ) {
    super('NORMALIZATION_ERROR', `[${provider}] ${message}`, 422, options);
    this.instrument = options?.code;
  }
}

export class UnknownProviderError extends AppError {
  constructor(public readonly provider: string, known: readonly string[] = []) {
    super(
      'UNKNOWN_PROVIDER',
      `Provider "${provider}" is not registered` +
        (known.length > 0 ? ` (registered: ${known.join(', ')})` : ''),
      400
    );
  }
}

// ═══════════════════════════════════════════════════════════════
// FETCH / CACHE / ORCHESTRATION
// ═══════════════════════════════════════════════════════════════

/**
 * Transient upstream failure. Absorbed by retry and rotation.
 */
export class FetchError extends AppError {
  readonly status?: number;
  readonly rateLimited: boolean;

  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown; status?: number; rateLimited?: boolean }
  ) {
    super('FETCH_ERROR', `[${provider}] ${message}`, 502, options);
    this.status = options?.status;
    this.rateLimited = options?.rateLimited ?? false;
  }
}

export class BackendUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CACHE_BACKEND_UNAVAILABLE', message, 503, options);
  }
}

export interface ProviderAttemptSummary {
  provider: string;
  attempts: number;
  lastError?: string;
  skipped?: 'COOLDOWN';
}

export class AllSourcesExhaustedError extends AppError {
  constructor(
    public readonly instrument: string,
    public readonly attempts: ProviderAttemptSummary[] = []
  ) {
    super(
      'ALL_SOURCES_EXHAUSTED',
      `No provider or cache entry could serve ${instrument}`,
      503
    );
  }
}

export class RequestCancelledError extends AppError {
  constructor(public readonly instrument: string) {
    super('REQUEST_CANCELLED', `Request for ${instrument} was cancelled`, 499);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
