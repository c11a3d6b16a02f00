/**
 * Error codes for channel operations
 */
export enum ChannelErrorCode {
  // Invocation
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',

  // Transport
  CONNECTION_FAILED = 'CONNECTION_FAILED',

  // Key agreement
  HANDSHAKE_FAILED = 'HANDSHAKE_FAILED',

  // Framing
  INVALID_ENVELOPE = 'INVALID_ENVELOPE',
  MESSAGE_TOO_LARGE = 'MESSAGE_TOO_LARGE',

  // Session
  SESSION_CLOSED = 'SESSION_CLOSED',
}

/**
 * Error raised by the transport, handshake, framing and session layers
 */
export class ChannelError extends Error {
  public readonly code: ChannelErrorCode;
  public readonly cause?: Error;
  public readonly context?: Record<string, unknown>;

  private constructor(
    code: ChannelErrorCode,
    message: string,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ChannelError';
    this.code = code;
    this.cause = cause;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChannelError);
    }
  }

  static invalidArguments(reason: string): ChannelError {
    return new ChannelError(ChannelErrorCode.INVALID_ARGUMENTS, reason);
  }

  static connectionFailed(operation: string, cause?: Error, context?: Record<string, unknown>): ChannelError {
    const detail = cause ? `: ${cause.message}` : '';
    return new ChannelError(
      ChannelErrorCode.CONNECTION_FAILED,
      `Connection ${operation} failed${detail}`,
      cause,
      { operation, ...context }
    );
  }

  static handshakeFailed(reason: string, cause?: Error): ChannelError {
    return new ChannelError(
      ChannelErrorCode.HANDSHAKE_FAILED,
      `Key exchange failed: ${reason}`,
      cause
    );
  }

  static invalidEnvelope(reason: string): ChannelError {
    return new ChannelError(ChannelErrorCode.INVALID_ENVELOPE, `Invalid envelope: ${reason}`);
  }

  static messageTooLarge(size: number, max: number): ChannelError {
    return new ChannelError(
      ChannelErrorCode.MESSAGE_TOO_LARGE,
      `Message too large: ${size} > ${max}`,
      undefined,
      { size, max }
    );
  }

  static sessionClosed(): ChannelError {
    return new ChannelError(ChannelErrorCode.SESSION_CLOSED, 'Session is closed');
  }

  /**
   * Wrap an unknown thrown value as an Error
   */
  static toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
  }
}

/**
 * Type guard for ChannelError, optionally matching a code
 */
export function isChannelError(error: unknown, code?: ChannelErrorCode): error is ChannelError {
  return error instanceof ChannelError && (code === undefined || error.code === code);
}
