export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No adapter is registered for a company's careers platform. */
export class AdapterUnavailableError extends AppError {
  readonly platform: string | null;

  constructor(platform: string | null) {
    super('ADAPTER_UNAVAILABLE', `No adapter for platform: ${platform ?? 'unknown'}`);
    this.platform = platform;
  }
}

/** A company descriptor lacks what its adapter needs, e.g. a board token. */
export class AdapterConfigError extends AppError {
  constructor(message: string) {
    super('ADAPTER_CONFIG', message);
  }
}

/** Network error, timeout or non-2xx response from a job source. */
export class FetchFailureError extends AppError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super('FETCH_FAILURE', message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status ?? null;
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} not found: ${id}`);
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class ConfigError extends ValidationError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
