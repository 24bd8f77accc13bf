import type { SourcePosition } from './index.js';

export type SyntaxErrorCode =
  | 'UNMATCHED_DELIMITER'
  | 'UNTERMINATED_STRING'
  | 'INVALID_ESCAPE'
  | 'UNKNOWN_BUILTIN'
  | 'UNEXPECTED_TOKEN';

export type BuildErrorCode = 'INVALID_ITEM';

export type LayoutErrorCode = 'SHAPER_TIMEOUT' | 'SHAPER_FAILED';

export type FolioErrorCode = SyntaxErrorCode | BuildErrorCode | LayoutErrorCode;

/**
 * Base class for every error the pipeline throws. Carries a stable string code
 * that callers branch on instead of the message.
 */
export class FolioError<TCode extends string = string> extends Error {
  readonly code: TCode;
  readonly details?: unknown;

  constructor(code: TCode, message: string, details?: unknown) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'FolioError';
    this.code = code;
    this.details = details;
  }
}

const formatPosition = (position: SourcePosition): string => `line ${position.line}, column ${position.column}`;

/** Malformed markup. Fatal for the whole document. */
export class MarkupSyntaxError extends FolioError<SyntaxErrorCode> {
  readonly position: SourcePosition;

  constructor(code: SyntaxErrorCode, message: string, position: SourcePosition) {
    super(code, `${message} (${formatPosition(position)})`, { position });
    this.name = 'MarkupSyntaxError';
    this.position = position;
  }
}

/** Well-formed markup whose items break the builtin argument rules. */
export class MarkupBuildError extends FolioError<BuildErrorCode> {
  readonly position: SourcePosition;

  constructor(message: string, position: SourcePosition) {
    super('INVALID_ITEM', `${message} (${formatPosition(position)})`, { position });
    this.name = 'MarkupBuildError';
    this.position = position;
  }
}

/** Thrown by a text shaper that could not answer in time. */
export class ShaperTimeoutError extends Error {
  constructor(message = 'text shaper timed out') {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ShaperTimeoutError';
  }
}

export class LayoutError extends FolioError<LayoutErrorCode> {
  /** Whether the caller may try the same layout again. The engine itself never retries. */
  readonly retryable: boolean;

  constructor(code: LayoutErrorCode, message: string, options: { retryable: boolean; cause?: unknown }) {
    super(code, message, { cause: options.cause });
    this.name = 'LayoutError';
    this.retryable = options.retryable;
  }
}
