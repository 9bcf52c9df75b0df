/**
 * BridgeError types and utilities.
 *
 * Every failure the bridge handles is classified into a BridgeError at the
 * boundary nearest its origin. Users never see these messages: they only see
 * the configured templates from `settings.messages`.
 */

export const ErrorCode = {
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
  AGENT_QUERY_FAILED: 'AGENT_QUERY_FAILED',
  AGENT_TIMEOUT: 'AGENT_TIMEOUT',
  SLACK_API_ERROR: 'SLACK_API_ERROR',
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface BridgeErrorOptions {
  recoverable?: boolean;
  cause?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Structured error for all bridge failures.
 */
export class BridgeError extends Error {
  readonly code: ErrorCodeType;
  /** Whether the process can keep serving events after this error */
  readonly recoverable: boolean;
  override readonly cause?: Error;
  readonly metadata?: Record<string, unknown>;

  constructor(code: ErrorCodeType, message: string, options: BridgeErrorOptions = {}) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.recoverable = options.recoverable ?? isRecoverable(code);
    this.cause = options.cause;
    this.metadata = options.metadata;
  }
}

export function createBridgeError(
  code: ErrorCodeType,
  message: string,
  options?: BridgeErrorOptions
): BridgeError {
  return new BridgeError(code, message, options);
}

export function isBridgeError(value: unknown): value is BridgeError {
  return value instanceof BridgeError;
}

/**
 * Startup errors are fatal; everything raised while serving an event is not.
 */
export function isRecoverable(code: ErrorCodeType): boolean {
  const fatalCodes: ErrorCodeType[] = [
    'CONFIG_NOT_FOUND',
    'CONFIG_INVALID',
    'MISSING_CREDENTIAL',
  ];
  return !fatalCodes.includes(code);
}

/**
 * Infer an ErrorCode from the message of an unclassified error.
 */
export function inferErrorCode(error: Error | undefined): ErrorCodeType {
  if (!error) return 'UNKNOWN_ERROR';
  const msg = error.message.toLowerCase();

  // "connection timed out" must classify as a timeout
  if (error.name === 'AbortError' || msg.includes('timeout') || msg.includes('timed out')) {
    return 'AGENT_TIMEOUT';
  }
  if (msg.includes('slack') || msg.includes('chat.postmessage') || msg.includes('chat.update')) {
    return 'SLACK_API_ERROR';
  }

  return 'UNKNOWN_ERROR';
}

/**
 * Normalize anything caught in a `catch` block into a BridgeError.
 *
 * BridgeErrors pass through untouched. Errors keep their stack as `cause`.
 * Non-error values are stringified into the message.
 *
 * `sourceCode` names where the caller knows the error came from. It wins over
 * message inference, except that a timeout is always reported as one.
 * Without it the code is inferred from the message.
 */
export function toBridgeError(value: unknown, sourceCode?: ErrorCodeType): BridgeError {
  if (isBridgeError(value)) return value;

  if (value instanceof Error) {
    const inferred = inferErrorCode(value);
    const code = sourceCode && inferred !== 'AGENT_TIMEOUT' ? sourceCode : inferred;
    return createBridgeError(code, value.message, { cause: value });
  }

  return createBridgeError(sourceCode ?? 'UNKNOWN_ERROR', String(value));
}
