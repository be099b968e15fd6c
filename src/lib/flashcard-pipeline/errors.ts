/**
 * Pipeline error taxonomy.
 *
 * Fatal errors (configuration, source) stop a stage and surface as a
 * non-zero exit. Recoverable errors are caught at the item boundary and
 * only drop the affected message, candidate or conversation.
 */

export type PipelineErrorCode =
  | 'CONFIGURATION'
  | 'SOURCE_UNAVAILABLE'
  | 'SERVICE'
  | 'PARSE'
  | 'DATA';

export class PipelineError extends Error {
  code: PipelineErrorCode;
  context: Record<string, unknown>;
  recoverable: boolean;

  constructor(
    message: string,
    code: PipelineErrorCode,
    context: Record<string, unknown> = {},
    recoverable = true
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;
    this.recoverable = recoverable;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      recoverable: this.recoverable,
    };
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION', context, false);
    this.name = 'ConfigurationError';
  }
}

export class SourceUnavailableError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SOURCE_UNAVAILABLE', context, false);
    this.name = 'SourceUnavailableError';
  }
}

export class ServiceError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SERVICE', context, true);
    this.name = 'ServiceError';
  }
}

export class ParseError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PARSE', context, true);
    this.name = 'ParseError';
  }
}

export class DataError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DATA', context, true);
    this.name = 'DataError';
  }
}

export function isRecoverable(error: unknown): boolean {
  return error instanceof PipelineError && error.recoverable;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
