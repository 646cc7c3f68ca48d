export type ErrorCode =
  | 'CONNECT_ERROR'
  | 'PARSE_ERROR'
  | 'RENDER_ERROR'
  | 'UPLOAD_ERROR'
  | 'NOTIFY_ERROR'
  | 'CONFIG_ERROR';

export class RiverwatchError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transient: handshake or read failure. Triggers backoff, never fatal. */
export class ConnectError extends RiverwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_ERROR', message, options);
  }
}

/** Data-level: the frame or sample is dropped and counted. */
export class ParseError extends RiverwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', message, options);
  }
}

export class RenderError extends RiverwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RENDER_ERROR', message, options);
  }
}

export class UploadError extends RiverwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPLOAD_ERROR', message, options);
  }
}

export class NotifyError extends RiverwatchError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super('NOTIFY_ERROR', message, options);
  }
}

/** Fatal at startup only. */
export class ConfigError extends RiverwatchError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super('CONFIG_ERROR', message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
