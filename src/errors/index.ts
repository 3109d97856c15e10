/**
 * Error types for the EML sender.
 */

/**
 * Error kinds categorizing different failure modes.
 */
export enum SenderErrorKind {
  // Message errors
  MalformedMessage = 'malformed_message',
  FileMissing = 'file_missing',

  // Connection errors
  ConnectionRefused = 'connection_refused',
  ConnectTimeout = 'connect_timeout',
  ConnectionClosed = 'connection_closed',
  WriteFailed = 'write_failed',

  // Protocol errors
  NegativeReply = 'negative_reply',
  CommandSequence = 'command_sequence',

  // Configuration errors
  SettingsInvalid = 'settings_invalid',

  // Generic
  Unknown = 'unknown',
}

/**
 * Error raised by the message transformer, the SMTP session and the settings loader.
 */
export class SenderError extends Error {
  /** Error kind. */
  readonly kind: SenderErrorKind;
  /** SMTP reply code for negative replies. */
  readonly replyCode?: number;
  /** EML or settings file the error relates to. */
  readonly file?: string;
  /** Underlying cause. */
  readonly cause?: Error;

  constructor(
    kind: SenderErrorKind,
    message: string,
    options?: {
      replyCode?: number;
      file?: string;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'SenderError';
    this.kind = kind;
    this.replyCode = options?.replyCode;
    this.file = options?.file;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SenderError);
    }
  }

  /**
   * Returns true if this error ends the whole SMTP session rather than a single file.
   */
  isSessionFatal(): boolean {
    return ![SenderErrorKind.FileMissing, SenderErrorKind.MalformedMessage].includes(this.kind);
  }

  /**
   * Creates an error for a message without a header/body boundary.
   */
  static malformedMessage(file?: string): SenderError {
    const message = 'Invalid mail: no blank line between header and body';
    return new SenderError(SenderErrorKind.MalformedMessage, file ? `${file}: ${message}` : message, {
      file,
    });
  }

  /**
   * Creates an error for an EML file that does not exist.
   */
  static fileMissing(file: string): SenderError {
    return new SenderError(SenderErrorKind.FileMissing, `${file}: EML file does not exist`, { file });
  }

  /**
   * Creates an error for a connection that ended before a complete reply was read.
   */
  static connectionClosed(message = 'Connection closed by foreign host', cause?: Error): SenderError {
    return new SenderError(SenderErrorKind.ConnectionClosed, message, { cause });
  }

  /**
   * Creates an error from a negative SMTP reply line.
   */
  static negativeReply(line: string): SenderError {
    const code = parseInt(line.substring(0, 3), 10);
    return new SenderError(SenderErrorKind.NegativeReply, line, {
      replyCode: isNaN(code) ? undefined : code,
    });
  }

  /**
   * Creates a settings validation error.
   */
  static settingsInvalid(message: string, file?: string): SenderError {
    return new SenderError(SenderErrorKind.SettingsInvalid, message, { file });
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      replyCode: this.replyCode,
      file: this.file,
    };
  }
}

/**
 * Type guard for SenderError.
 */
export function isSenderError(error: unknown): error is SenderError {
  return error instanceof SenderError;
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Returns the `code` of a Node.js system error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
