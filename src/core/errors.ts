export type ErrorKind =
  | 'VALIDATION'
  | 'SOURCE_FETCH'
  | 'RESOLUTION_TIMEOUT'
  | 'RESOLUTION_FAILURE'
  | 'CAPACITY_EXCEEDED'
  | 'CIRCUIT_OPEN'
  | 'POOL_TIMEOUT'
  | 'NOT_READY'
  | 'CONFIG';

/**
 * Base for every error the core surfaces. Messages are fixed strings or carry
 * config identifiers (source/server names), never query names.
 */
export class CoreError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ValidationError extends CoreError {
  constructor(message = 'invalid domain') {
    super('VALIDATION', message);
  }
}

export class SourceFetchError extends CoreError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_FETCH', message, options);
    this.source = source;
  }
}

export class ResolutionTimeout extends CoreError {
  constructor(message = 'resolution deadline exceeded') {
    super('RESOLUTION_TIMEOUT', message);
  }
}

export class ResolutionFailure extends CoreError {
  constructor(message = 'all upstream servers failed', options?: { cause?: unknown }) {
    super('RESOLUTION_FAILURE', message, options);
  }
}

export class CircuitOpenError extends CoreError {
  constructor(server: string) {
    super('CIRCUIT_OPEN', `circuit open for ${server}`);
  }
}

export class PoolTimeoutError extends CoreError {
  constructor(server: string) {
    super('POOL_TIMEOUT', `no connection available for ${server}`);
  }
}

export class ConfigError extends CoreError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('CONFIG', issues.length ? `${message}: ${issues.join('; ')}` : message, options);
    this.issues = issues;
  }
}

export function errorKindOf(err: unknown): ErrorKind | null {
  return err instanceof CoreError ? err.kind : null;
}

// Short code for logs and per-source results. Upstream transports throw plain
// Errors with code-style messages (UPSTREAM_TIMEOUT, HTTP_503, ...).
export function errorCode(err: unknown): string {
  if (err instanceof CoreError) return err.kind;
  if (err instanceof Error) {
    if ('code' in err && typeof err.code === 'string' && err.code) return err.code;
    return /^[A-Z0-9_]+$/.test(err.message) ? err.message : err.name;
  }
  return 'UNKNOWN';
}
