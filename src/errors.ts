/**
 * Fatal errors raised while loading or comparing documents.
 * None of them are recoverable: the CLI reports the message and exits 1.
 */

export type TDiffTomlErrorKind =
  | 'FileNotFound'
  | 'InvalidArgument'
  | 'ParseError'
  | 'IoError'
  | 'TooDeep';

export interface TDiffTomlErrorDetails {
  /** File the error relates to */
  file?: string;
  /** 1-based line reported by the parser */
  line?: number;
  /** 1-based column reported by the parser */
  column?: number;
  cause?: unknown;
}

export class DiffTomlError extends Error {
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;

  constructor(
    message: string,
    public readonly kind: TDiffTomlErrorKind,
    details: TDiffTomlErrorDetails = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'DiffTomlError';
    this.file = details.file;
    this.line = details.line;
    this.column = details.column;
  }
}

/**
 * Message of any thrown value, for one-line CLI diagnostics.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
