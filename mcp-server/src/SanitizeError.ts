export type SanitizeErrorCode =
  | 'InvalidContainer'
  | 'MalformedXml'
  | 'UnsupportedPart'
  | 'IoError'
  | 'OutputExists'
  | 'InvalidConfig';

export interface SanitizeErrorOptions {
  /** Container entry the failure belongs to, when there is one */
  entryName?: string;
  cause?: unknown;
}

/**
 * Every failure the sanitizer reports. `code` discriminates the kind;
 * only `UnsupportedPart` is recovered from (the part is passed through).
 */
export class SanitizeError extends Error {
  readonly code: SanitizeErrorCode;
  readonly entryName?: string;

  constructor(code: SanitizeErrorCode, message: string, options: SanitizeErrorOptions = {}) {
    super(options.entryName ? `${options.entryName}: ${message}` : message, { cause: options.cause });
    this.name = 'SanitizeError';
    this.code = code;
    this.entryName = options.entryName;
  }
}

export function isSanitizeError(err: unknown, code?: SanitizeErrorCode): err is SanitizeError {
  return err instanceof SanitizeError && (code === undefined || err.code === code);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
