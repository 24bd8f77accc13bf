import {
  FolioError,
  LayoutError,
  MarkupBuildError,
  MarkupSyntaxError,
} from '@folio/contracts';
import { LayoutOptionsError } from '@folio/layout-bridge';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_COMMAND'
  | 'MISSING_REQUIRED'
  | 'VALIDATION_ERROR'
  | 'FILE_READ_ERROR'
  | 'SYNTAX_ERROR'
  | 'BUILD_ERROR'
  | 'LAYOUT_FAILED'
  | 'COMMAND_FAILED';

export class CliError extends FolioError<CliErrorCode> {
  readonly exitCode: number;

  constructor(code: CliErrorCode, message: string, details?: unknown, exitCode = 1) {
    super(code, message, details);
    Object.setPrototypeOf(this, CliError.prototype);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

/** Normalises anything thrown below the command line into a {@link CliError}. */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;

  if (error instanceof MarkupSyntaxError) {
    return new CliError('SYNTAX_ERROR', error.message, { code: error.code, position: error.position });
  }
  if (error instanceof MarkupBuildError) {
    return new CliError('BUILD_ERROR', error.message, { code: error.code, position: error.position });
  }
  if (error instanceof LayoutOptionsError) {
    return new CliError('VALIDATION_ERROR', error.message, { issues: error.issues });
  }
  if (error instanceof LayoutError) {
    return new CliError('LAYOUT_FAILED', error.message, { code: error.code, retryable: error.retryable });
  }

  if (error instanceof Error) {
    return new CliError('COMMAND_FAILED', error.message, {
      name: error.name,
    });
  }

  return new CliError('COMMAND_FAILED', 'Unknown error', {
    error,
  });
}
