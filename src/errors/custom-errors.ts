import { createEnum } from '../utils/create-enum';

const errorKindValues = createEnum([
  'InvalidUrl',
  'Unsupported',
  'AuthRequired',
  'NetworkError',
  'ParseError',
  'PageMissing',
  'DecodeError',
  'IoError',
  'CorruptStore',
  'ConfigError',
  'Cancelled',
] as const);

/**
 * Kind of failure, attached to every error and to failed download results
 */
export type ErrorKind = typeof errorKindValues.type;

/**
 * Base error class for panelgrab
 */
export class PanelgrabError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
  ) {
    super(message);
    this.name = 'PanelgrabError';
  }
}

/**
 * URL does not match any known grammar
 */
export class InvalidUrlError extends PanelgrabError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message, 'InvalidUrl');
    this.name = 'InvalidUrlError';
  }
}

/**
 * Platform recognized, but the resource or operation is not handled
 */
export class UnsupportedError extends PanelgrabError {
  constructor(message: string) {
    super(message, 'Unsupported');
    this.name = 'UnsupportedError';
  }
}

/**
 * Source needs credentials that are missing or were rejected
 */
export class AuthRequiredError extends PanelgrabError {
  constructor(
    message: string,
    public readonly platform: string,
  ) {
    super(message, 'AuthRequired');
    this.name = 'AuthRequiredError';
  }
}

/**
 * Transient network failure (the only retryable kind)
 */
export class NetworkError extends PanelgrabError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message, 'NetworkError');
    this.name = 'NetworkError';
  }
}

/**
 * Platform response did not have the expected structure
 */
export class ParseError extends PanelgrabError {
  constructor(
    message: string,
    public readonly url?: string,
  ) {
    super(message, 'ParseError');
    this.name = 'ParseError';
  }
}

/**
 * Page handle is stale or was removed server-side
 */
export class PageMissingError extends PanelgrabError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message, 'PageMissing');
    this.name = 'PageMissingError';
  }
}

/**
 * Page bytes could not be turned into an image
 */
export class DecodeError extends PanelgrabError {
  constructor(message: string) {
    super(message, 'DecodeError');
    this.name = 'DecodeError';
  }
}

/**
 * Local filesystem error
 */
export class IoError extends PanelgrabError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message, 'IoError');
    this.name = 'IoError';
  }
}

/**
 * Update file exists but cannot be trusted
 */
export class CorruptStoreError extends PanelgrabError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message, 'CorruptStore');
    this.name = 'CorruptStoreError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends PanelgrabError {
  constructor(message: string) {
    super(message, 'ConfigError');
    this.name = 'ConfigError';
  }
}

/**
 * Work was stopped by a cancellation signal
 */
export class CancelledError extends PanelgrabError {
  constructor(message = 'Operation cancelled') {
    super(message, 'Cancelled');
    this.name = 'CancelledError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof PanelgrabError && error.kind === 'NetworkError';
}

/**
 * Get a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify any thrown value
 *
 * Non-panelgrab values are mapped by shape: aborts are cancellations, fetch
 * TypeErrors are network failures, errno errors are local I/O.
 */
export function describeError(error: unknown): { kind: ErrorKind; message: string } {
  if (error instanceof PanelgrabError) {
    return { kind: error.kind, message: error.message };
  }

  const message = errorMessage(error);

  if (error instanceof Error && error.name === 'AbortError') {
    return { kind: 'Cancelled', message };
  }
  if (error instanceof TypeError && /fetch/i.test(message)) {
    return { kind: 'NetworkError', message };
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return { kind: 'IoError', message };
  }
  return { kind: 'ParseError', message };
}
