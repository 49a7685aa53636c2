import { ZodError } from 'zod';

export const ErrorCode = {
  CONFIG_ERROR: 'CONFIG_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  CORPUS_UNAVAILABLE: 'CORPUS_UNAVAILABLE',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class CrosscheckError extends Error {
  public readonly code: ErrorCodeType;

  constructor(message: string, code: ErrorCodeType, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'CrosscheckError';
    this.code = code;
  }
}

export type ParseErrorKind = 'not_found' | 'unreadable' | 'encoding';

export class ParseError extends CrosscheckError {
  public readonly kind: ParseErrorKind;
  public readonly filePath: string;

  constructor(filePath: string, kind: ParseErrorKind, message: string, cause?: unknown) {
    super(message, ErrorCode.PARSE_ERROR, { cause });
    this.name = 'ParseError';
    this.kind = kind;
    this.filePath = filePath;
  }
}

/**
 * Raised when none of the corpus paths can be read. This is the only
 * condition that aborts a validation run.
 */
export class CorpusUnavailableError extends CrosscheckError {
  public readonly paths: string[];

  constructor(paths: string[], message: string) {
    super(message, ErrorCode.CORPUS_UNAVAILABLE);
    this.name = 'CorpusUnavailableError';
    this.paths = paths;
  }
}

export class ConfigError extends CrosscheckError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.CONFIG_ERROR, { cause });
    this.name = 'ConfigError';
  }

  static fromZod(configPath: string, error: ZodError): ConfigError {
    const issues = error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return new ConfigError(`Invalid configuration in ${configPath}: ${issues}`, error);
  }
}

export class InvalidArgumentsError extends CrosscheckError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_ARGUMENTS);
    this.name = 'InvalidArgumentsError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
