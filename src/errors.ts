export type StartupErrorKind = 'CONFIG' | 'LISTEN' | 'TLS_LOAD';

/** Failure before the server is serving traffic. Always fatal. */
export class StartupError extends Error {
  readonly kind: StartupErrorKind;

  constructor(kind: StartupErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
    this.kind = kind;
  }
}

export class ConfigError extends StartupError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG', `invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class ListenError extends StartupError {
  constructor(address: string, cause: unknown) {
    super('LISTEN', `unable to create listener on ${address}: ${describeCause(cause)}`, { cause });
    this.name = 'ListenError';
  }
}

export class TlsLoadError extends StartupError {
  constructor(path: string, cause: unknown) {
    super('TLS_LOAD', `unable to load TLS material from ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'TlsLoadError';
  }
}

/** Per-request failures; these only ever become an HTTP status plus a log record. */
export type RequestErrorType = 'UNAUTHORIZED' | 'INJECTED_FAULT' | 'SERIALIZATION' | 'INTERNAL';

export function requestErrorStatus(type: RequestErrorType): number {
  switch (type) {
    case 'UNAUTHORIZED': return 401;
    case 'INJECTED_FAULT':
    case 'SERIALIZATION':
    case 'INTERNAL':
    default: return 500;
  }
}

export class RequestError extends Error {
  readonly type: RequestErrorType;

  constructor(type: RequestErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestError';
    this.type = type;
  }

  get statusCode(): number {
    return requestErrorStatus(this.type);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
