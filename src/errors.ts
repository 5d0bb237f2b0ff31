export class CardQrError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CardQrError';
    this.exitCode = exitCode;
  }
}

/** Bad CLI argument or configuration value. Raised before any network call. */
export class ValidationError extends CardQrError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
    this.name = 'ValidationError';
  }
}

/** Credentials rejected, session refused, or portal unreachable while signing in. */
export class AuthenticationError extends CardQrError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 3, options);
    this.name = 'AuthenticationError';
  }
}

/** The portal answered, but not with the markup or payload we expect. */
export class ParseError extends CardQrError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 4, options);
    this.name = 'ParseError';
  }
}

export class IOError extends CardQrError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 5, options);
    this.name = 'IOError';
  }
}

export class PortalError extends CardQrError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, 6, options);
    this.name = 'PortalError';
    this.status = status;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
