import type { ZodIssue } from 'zod';

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'AUTH_REQUIRED'
  | 'PROVIDER_FAILED'
  | 'STORAGE_FAILED'
  | 'STORAGE_UNAVAILABLE'
  | 'INVALID_DOCUMENT_ID';

export class TaskcalError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed create/update/request input, rejected before storage or provider. */
export class ValidationError extends TaskcalError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message, 'VALIDATION_FAILED');
  }

  static fromIssues(subject: string, issues: ZodIssue[]): ValidationError {
    const detail = issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return new ValidationError(`Invalid ${subject}: ${detail}`, issues);
  }
}

/** The provider needs a fresh credential exchange (human-in-the-loop) before any call. */
export class AuthenticationRequiredError extends TaskcalError {
  constructor(
    public readonly provider: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Authentication required for ${provider}: ${reason}`, 'AUTH_REQUIRED', options);
  }
}

export class ProviderOperationFailedError extends TaskcalError {
  constructor(
    public readonly operation: string,
    public readonly providerMessage: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`Calendar ${operation} failed: ${providerMessage}`, 'PROVIDER_FAILED', options);
  }
}

export class StorageError extends TaskcalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_FAILED', options);
  }
}

export class StorageUnavailableError extends TaskcalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_UNAVAILABLE', options);
  }
}

export class InvalidDocumentIdError extends TaskcalError {
  constructor(public readonly raw: string) {
    super(`Invalid document id: ${JSON.stringify(raw)}`, 'INVALID_DOCUMENT_ID');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
