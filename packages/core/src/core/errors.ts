/**
 * GeoConvert Error Types
 *
 * Every failure that ends a job is one of the classes below. Each carries the
 * stage that raised it, the offending feature index when there is one, and
 * the underlying cause, so the caller can fill its diagnostic fields without
 * re-deriving pipeline state.
 *
 * None of these errors are retried inside the core. Retry policy belongs to
 * the job queue that invoked the pipeline.
 */

/**
 * Pipeline stages an error can be attributed to
 */
export type PipelineStage =
  | 'job'
  | 'scratch'
  | 'read'
  | 'detect'
  | 'clean'
  | 'normalize'
  | 'reproject'
  | 'write'
  | 'report'
  | 'publish';

export type ConversionErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_ARCHIVE'
  | 'MALFORMED_DATA'
  | 'PROJECTION_TRANSFORM'
  | 'WRITE_CAPABILITY'
  | 'TIMEOUT'
  | 'RESOURCE_EXHAUSTED'
  | 'STAGE_FAILURE';

export interface ConversionErrorOptions {
  readonly featureIndex?: number;
  readonly cause?: unknown;
}

/**
 * Diagnostic record handed back to the caller on failure
 */
export interface ErrorDiagnostic {
  readonly error_code: ConversionErrorCode;
  readonly error_message: string;
  readonly stage: PipelineStage;
  readonly feature_index?: number;
  readonly cause?: string;
}

/**
 * Base class of the error taxonomy
 */
export abstract class ConversionError extends Error {
  abstract readonly code: ConversionErrorCode;
  readonly stage: PipelineStage;
  readonly featureIndex?: number;
  override readonly cause?: unknown;

  protected constructor(message: string, stage: PipelineStage, options: ConversionErrorOptions = {}) {
    super(message);
    this.stage = stage;
    this.featureIndex = options.featureIndex;
    this.cause = options.cause;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Message of the underlying cause, if any
   */
  get causeMessage(): string | undefined {
    if (this.cause === undefined) return undefined;
    return this.cause instanceof Error ? this.cause.message : String(this.cause);
  }

  toDiagnostic(): ErrorDiagnostic {
    return {
      error_code: this.code,
      error_message: this.message,
      stage: this.stage,
      ...(this.featureIndex !== undefined ? { feature_index: this.featureIndex } : {}),
      ...(this.causeMessage !== undefined ? { cause: this.causeMessage } : {}),
    };
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [`${this.name}: ${this.message}`, `  Stage: ${this.stage}`];
    if (this.featureIndex !== undefined) {
      parts.push(`  Feature: #${this.featureIndex}`);
    }
    if (this.causeMessage !== undefined) {
      parts.push(`  Cause: ${this.causeMessage}`);
    }
    return parts.join('\n');
  }
}

/**
 * Unknown container, unknown output format, or extension/signature mismatch
 */
export class UnsupportedFormatError extends ConversionError {
  override readonly name = 'UnsupportedFormatError';
  readonly code = 'UNSUPPORTED_FORMAT' as const;

  constructor(message: string, stage: PipelineStage = 'read', options?: ConversionErrorOptions) {
    super(message, stage, options);
  }
}

/**
 * Archive that cannot be opened or lacks its expected inner layout
 */
export class CorruptArchiveError extends ConversionError {
  override readonly name = 'CorruptArchiveError';
  readonly code = 'CORRUPT_ARCHIVE' as const;

  constructor(message: string, options?: ConversionErrorOptions) {
    super(message, 'read', options);
  }
}

/**
 * Parse failure inside a recognized container, or an invalid job descriptor
 */
export class MalformedDataError extends ConversionError {
  override readonly name = 'MalformedDataError';
  readonly code = 'MALFORMED_DATA' as const;

  constructor(message: string, stage: PipelineStage = 'read', options?: ConversionErrorOptions) {
    super(message, stage, options);
  }
}

/**
 * Coordinate transform undefined for a feature, or an unknown CRS
 */
export class ProjectionTransformError extends ConversionError {
  override readonly name = 'ProjectionTransformError';
  readonly code = 'PROJECTION_TRANSFORM' as const;

  constructor(message: string, options?: ConversionErrorOptions) {
    super(message, 'reproject', options);
  }
}

/**
 * Target container cannot represent the layer's geometry kinds or values
 */
export class WriteCapabilityError extends ConversionError {
  override readonly name = 'WriteCapabilityError';
  readonly code = 'WRITE_CAPABILITY' as const;

  constructor(message: string, options?: ConversionErrorOptions) {
    super(message, 'write', options);
  }
}

/**
 * Hard time budget exceeded
 */
export class TimeoutError extends ConversionError {
  override readonly name = 'TimeoutError';
  readonly code = 'TIMEOUT' as const;

  constructor(
    message: string,
    stage: PipelineStage,
    public readonly budgetMs: number,
    options?: ConversionErrorOptions
  ) {
    super(message, stage, options);
  }
}

/**
 * Per-job temporary storage quota exhausted
 */
export class ResourceExhaustedError extends ConversionError {
  override readonly name = 'ResourceExhaustedError';
  readonly code = 'RESOURCE_EXHAUSTED' as const;

  constructor(
    message: string,
    public readonly limitBytes: number,
    options?: ConversionErrorOptions
  ) {
    super(message, 'scratch', options);
  }
}

/**
 * Unexpected failure inside a stage (a bug or an environment fault)
 */
export class PipelineStageError extends ConversionError {
  override readonly name = 'PipelineStageError';
  readonly code = 'STAGE_FAILURE' as const;

  constructor(message: string, stage: PipelineStage, options?: ConversionErrorOptions) {
    super(message, stage, options);
  }
}

/**
 * Type guard to check if an error belongs to the conversion taxonomy
 */
export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

/**
 * Map any thrown value to a taxonomy error attributed to `stage`
 */
export function wrapStageError(error: unknown, stage: PipelineStage): ConversionError {
  if (isConversionError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineStageError(`Stage '${stage}' failed: ${message}`, stage, { cause: error });
}
