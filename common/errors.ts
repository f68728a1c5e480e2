export type XrefErrorCode = 'SCAN_FAILED' | 'DECODE_FAILED' | 'WRITE_FAILED' | 'INVALID_CONFIG';

export class XrefError extends Error {
  readonly code: XrefErrorCode;

  constructor(code: XrefErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ScanError extends XrefError {
  constructor(readonly root: string, cause: unknown) {
    super('SCAN_FAILED', `Failed to scan ${root}: ${errorMessage(cause)}`, { cause });
  }
}

export class DecodeError extends XrefError {
  constructor(readonly file: string, reason: string, cause?: unknown) {
    super('DECODE_FAILED', `Failed to decode ${file}: ${reason}`, { cause });
  }
}

export class WriteError extends XrefError {
  constructor(readonly file: string, cause: unknown) {
    super('WRITE_FAILED', `Failed to write ${file}: ${errorMessage(cause)}`, { cause });
  }
}

export class ConfigError extends XrefError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Message plus at most `frames` stack frames of the error (or its cause). */
export function shortStackTrace(error: unknown, frames = 10): string {
  const source = error instanceof XrefError && error.cause instanceof Error ? error.cause : error;
  if (!(source instanceof Error) || !source.stack) {
    return errorMessage(error);
  }

  const lines = source.stack.split('\n');
  const header = lines.filter((line) => !line.trimStart().startsWith('at '))[0] ?? source.message;
  const stack = lines.filter((line) => line.trimStart().startsWith('at ')).slice(0, frames);
  return [header, ...stack].join('\n');
}
