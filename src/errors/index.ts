/**
 * Error taxonomy
 *
 * Parse degradation is not an error and never appears here; it is returned
 * as data by the parser. NotFound is a null result, not an exception.
 */

export type QualificationErrorCode =
  | 'VALIDATION_FAILED'
  | 'IDENTITY_CONFLICT'
  | 'APPEND_CONFLICT'
  | 'CORRUPT_RECORD'
  | 'CONFIG_ERROR'
  | 'MODEL_ERROR';

/**
 * Base class for every error the core raises on purpose
 */
export class QualificationError extends Error {
  readonly code: QualificationErrorCode;
  readonly details?: unknown;

  constructor(code: QualificationErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'QualificationError';
    this.code = code;
    this.details = details;
  }
}

/**
 * A write would persist a record that breaks the required-field invariant,
 * or carries a value outside a field's domain
 */
export class ValidationFailedError extends QualificationError {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super('VALIDATION_FAILED', message, { fields });
    this.name = 'ValidationFailedError';
    this.fields = fields;
  }
}

export class IdentityConflictError extends QualificationError {
  constructor(address: string, leadId: string) {
    super('IDENTITY_CONFLICT', `Identity for ${address} was claimed but ${leadId} cannot be read`, {
      address,
      leadId,
    });
    this.name = 'IdentityConflictError';
  }
}

export class AppendConflictError extends QualificationError {
  constructor(leadId: string, attempts: number) {
    super('APPEND_CONFLICT', `Could not claim an event sequence for ${leadId} after ${attempts} attempts`, {
      leadId,
      attempts,
    });
    this.name = 'AppendConflictError';
  }
}

export class CorruptRecordError extends QualificationError {
  constructor(key: string, issues: string[]) {
    super('CORRUPT_RECORD', `Stored object ${key} failed validation`, { key, issues });
    this.name = 'CorruptRecordError';
  }
}

export class ConfigError extends QualificationError {
  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`, { issues });
    this.name = 'ConfigError';
  }
}

/**
 * The language model could not produce a completion
 */
export class LanguageModelError extends QualificationError {
  readonly retryable: boolean;

  constructor(message: string, retryable = false, cause?: unknown) {
    super('MODEL_ERROR', message, cause === undefined ? undefined : { cause: describeCause(cause) });
    this.name = 'LanguageModelError';
    this.retryable = retryable;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}

/**
 * Flatten any thrown value into the error block of a ModuleResult
 */
export function toResultError(error: unknown): { code: string; message: string; details?: unknown } {
  if (error instanceof QualificationError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: 'STORAGE_ERROR', message, details: error };
}
