/**
 * Error taxonomy for the inference client
 *
 * - ServiceBusyError: 503 / queue full, the only retryable kind
 * - ServiceError: any other non-2xx response
 * - InvalidInputError: rejected locally, never sent
 * - DecodeError: response body did not match the expected shape
 * - ConnectionError: no response (unreachable host, timeout, closed client)
 * - MaxRetriesExceededError / CancelledError: terminal retry outcomes
 */

export class ServiceBusyError extends Error {
  readonly status = 503;

  constructor(message = 'Server busy - queue full') {
    super(message);
    this.name = 'ServiceBusyError';
  }
}

export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

export class InvalidInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidInputError';
  }
}

export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export class ConnectionError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class MaxRetriesExceededError extends Error {
  constructor(public readonly attempts: number) {
    super('Max retries exceeded');
    this.name = 'MaxRetriesExceededError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isBusyError(error: unknown): error is ServiceBusyError {
  return error instanceof ServiceBusyError;
}

// ==========================================
// FORMATTING
// ==========================================

const DEBUG_ERRORS =
  process.env.DEBUG_ERRORS === '1' ||
  process.env.DEBUG_ERRORS === 'true' ||
  process.env.DEBUG_ERRORS === 'yes';

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [`${error.name || 'Error'}: ${error.message}`];
    if (error instanceof ConnectionError && error.code) {
      parts.push(`code=${error.code}`);
    }
    if (error instanceof ServiceError || error instanceof ServiceBusyError) {
      parts.push(`status=${error.status}`);
    }
    if (error instanceof ServiceError && error.body) {
      parts.push(`body=${error.body.slice(0, 200)}`);
    }
    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

/** Error text stored in a TaskOutcome. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.warn(prefix + formatError(error));
  if (DEBUG_ERRORS && error instanceof Error && error.stack) {
    console.warn(error.stack);
  }
}
