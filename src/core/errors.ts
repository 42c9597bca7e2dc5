import type { StageName } from './types.js';

/** Report-level classification of a failure. */
export type ErrorKind =
  | 'ConfigError'
  | 'ValidationError'
  | 'GenerationError'
  | 'IOError'
  | 'ProviderError'
  | 'CancelledError'
  | 'InternalError';

export class PysmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly kind: ErrorKind,
    public readonly stage?: StageName,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PysmithError';
  }
}

export class ConfigError extends PysmithError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'ConfigError', undefined, cause);
    this.name = 'ConfigError';
  }
}

export interface Violation {
  field: string;
  message: string;
}

export class ValidationError extends PysmithError {
  constructor(
    message: string,
    public readonly violations: Violation[] = [],
    public readonly path?: string,
  ) {
    super(message, 'VALIDATION_ERROR', 'ValidationError', 'validation');
    this.name = 'ValidationError';
  }
}

export class GenerationError extends PysmithError {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly placeholder?: string,
  ) {
    super(message, 'GENERATION_ERROR', 'GenerationError');
    this.name = 'GenerationError';
  }
}

export class FileSystemError extends PysmithError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'IO_ERROR', 'IOError', undefined, cause);
    this.name = 'FileSystemError';
  }
}

export class ProviderError extends PysmithError {
  constructor(
    message: string,
    public readonly capability: string,
    public readonly provider?: string,
    cause?: Error,
  ) {
    super(message, 'PROVIDER_ERROR', 'ProviderError', undefined, cause);
    this.name = 'ProviderError';
  }
}

export class CancelledError extends PysmithError {
  constructor(message = 'Generation run was cancelled') {
    super(message, 'CANCELLED', 'CancelledError');
    this.name = 'CancelledError';
  }
}

/** Serializable error record carried by a stage result. Never holds a stack. */
export interface ErrorRecord {
  kind: ErrorKind;
  code: string;
  message: string;
  path?: string;
  placeholder?: string;
  provider?: string;
  capability?: string;
  violations?: Violation[];
}

export function describeError(error: unknown): ErrorRecord {
  if (error instanceof PysmithError) {
    const record: ErrorRecord = { kind: error.kind, code: error.code, message: error.message };
    if (error instanceof ValidationError) {
      if (error.violations.length > 0) record.violations = error.violations;
      if (error.path) record.path = error.path;
    } else if (error instanceof GenerationError) {
      if (error.path) record.path = error.path;
      if (error.placeholder) record.placeholder = error.placeholder;
    } else if (error instanceof FileSystemError) {
      record.path = error.path;
    } else if (error instanceof ProviderError) {
      record.capability = error.capability;
      if (error.provider) record.provider = error.provider;
    }
    return record;
  }

  // Anything unclassified that escapes a stage is a defect, not a disk failure
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'InternalError', code: 'UNEXPECTED_ERROR', message };
}
