/**
 * Error codes for failures raised inside the gateway
 */
export enum GatewayErrorCode {
  INVALID_PHASE_TRANSITION = 'invalid_phase_transition',
  PROTOCOL_ERROR = 'protocol_error',
  INVALID_CONFIGURATION = 'invalid_configuration',
  CONNECTION_CLOSED = 'connection_closed',
  DEBUGGEE_FAILED = 'debuggee_failed',
}

/**
 * Gateway error class that extends base Error with a machine-readable code.
 */
export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly cause?: Error;

  public constructor(message: string, code: GatewayErrorCode, cause?: Error) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, GatewayError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static invalidPhaseTransition(from: string, to: string): GatewayError {
    return new GatewayError(
      `Invalid session phase transition: ${from} -> ${to}`,
      GatewayErrorCode.INVALID_PHASE_TRANSITION,
    );
  }

  public static protocolError(m: string, c?: Error): GatewayError {
    return new GatewayError(
      `Protocol error: ${m}`,
      GatewayErrorCode.PROTOCOL_ERROR,
      c,
    );
  }

  public static invalidConfiguration(issues: string[]): GatewayError {
    return new GatewayError(
      `Invalid session configuration: ${issues.join('; ')}`,
      GatewayErrorCode.INVALID_CONFIGURATION,
    );
  }

  public static connectionClosed(): GatewayError {
    return new GatewayError(
      'Connection closed',
      GatewayErrorCode.CONNECTION_CLOSED,
    );
  }

  public static debuggeeFailed(c?: Error): GatewayError {
    return new GatewayError(
      `Debuggee failed${c ? `: ${c.message}` : ''}`,
      GatewayErrorCode.DEBUGGEE_FAILED,
      c,
    );
  }

  /**
   * Normalizes a thrown value into an Error instance
   */
  public static toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
  }
}
