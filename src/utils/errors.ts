/**
 * Typed errors raised inside the service.
 *
 * - SupportRouterError (base, carries a stable code)
 *   - GenerationError (generation backend failures)
 *   - StorageError (order store failures)
 *   - HandlerRegistryError (startup misconfiguration, fatal)
 *   - ConfigurationError (invalid environment)
 */

export enum ErrorCode {
  GENERATION_TIMEOUT = 'E1001',
  GENERATION_EMPTY = 'E1002',
  GENERATION_FAILED = 'E1003',

  STORAGE_UNAVAILABLE = 'E2001',
  STORAGE_QUERY_FAILED = 'E2002',

  REGISTRY_MISSING_HANDLER = 'E3001',
  REGISTRY_DUPLICATE_HANDLER = 'E3002',

  CONFIG_INVALID = 'E4001'
}

export class SupportRouterError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SupportRouterError';
    this.code = code;
  }
}

export type GenerationErrorKind = 'timeout' | 'empty' | 'backend';

export class GenerationError extends SupportRouterError {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, cause?: unknown) {
    const code =
      kind === 'timeout'
        ? ErrorCode.GENERATION_TIMEOUT
        : kind === 'empty'
          ? ErrorCode.GENERATION_EMPTY
          : ErrorCode.GENERATION_FAILED;
    super(code, message, cause);
    this.name = 'GenerationError';
    this.kind = kind;
  }
}

export class StorageError extends SupportRouterError {
  constructor(message: string, cause?: unknown, code: ErrorCode = ErrorCode.STORAGE_QUERY_FAILED) {
    super(code, message, cause);
    this.name = 'StorageError';
  }
}

export class HandlerRegistryError extends SupportRouterError {
  constructor(code: ErrorCode.REGISTRY_MISSING_HANDLER | ErrorCode.REGISTRY_DUPLICATE_HANDLER, message: string) {
    super(code, message);
    this.name = 'HandlerRegistryError';
  }
}

export class ConfigurationError extends SupportRouterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ErrorCode.CONFIG_INVALID, `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Normalize anything caught into an Error so it can be logged.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
