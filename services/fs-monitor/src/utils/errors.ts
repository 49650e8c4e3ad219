/**
 * FS Monitor - Custom Error Classes
 *
 * Structured error handling with full context for debugging
 */

export interface ErrorContext {
  operation: string;
  monitor?: string;
  timestamp: Date;
  [key: string]: unknown;
}

export class MonitorError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;

  constructor(message: string, code: string, context?: Partial<ErrorContext>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

// Validation Errors
export class ValidationError extends MonitorError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

// Connection errors: the monitor that raises one stops
export class FramingError extends MonitorError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'FRAMING_ERROR', context);
  }
}

export class ProtocolError extends MonitorError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'PROTOCOL_ERROR', context);
  }
}

export class HelperExitError extends MonitorError {
  public readonly exitCode: number | null;
  public readonly signal: string | null;

  constructor(
    message: string,
    exitCode: number | null,
    signal: string | null,
    context?: Partial<ErrorContext>
  ) {
    super(message, 'HELPER_EXIT', { ...context, exitCode, signal });
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

// Per-command errors (local to the caller)
export class TimeoutError extends MonitorError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, context?: Partial<ErrorContext>) {
    super(
      `Command timed out after ${timeoutMs}ms: ${operation}`,
      'TIMEOUT_ERROR',
      { ...context, operation, timeoutMs }
    );
    this.timeoutMs = timeoutMs;
  }
}

export class CommandError extends MonitorError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'COMMAND_ERROR', context);
  }
}

export class UnrecognizedReplyError extends MonitorError {
  public readonly reply: unknown;

  constructor(reply: unknown, context?: Partial<ErrorContext>) {
    super('Unrecognized reply from helper', 'UNRECOGNIZED_REPLY', { ...context, reply });
    this.reply = reply;
  }
}

// Lifecycle errors
export class MonitorNotFoundError extends MonitorError {
  constructor(monitor: string, context?: Partial<ErrorContext>) {
    super(`Monitor not found: ${monitor}`, 'MONITOR_NOT_FOUND', { ...context, monitor });
  }
}

export class MonitorAlreadyRunningError extends MonitorError {
  constructor(monitor: string, context?: Partial<ErrorContext>) {
    super(`Monitor already running: ${monitor}`, 'MONITOR_ALREADY_RUNNING', { ...context, monitor });
  }
}

export class MonitorStartupError extends MonitorError {
  constructor(monitor: string, reason: string, context?: Partial<ErrorContext>) {
    super(
      `Monitor ${monitor} failed to start: ${reason}`,
      'MONITOR_STARTUP_ERROR',
      { ...context, monitor }
    );
  }
}

export class MonitorStoppedError extends MonitorError {
  constructor(monitor: string, context?: Partial<ErrorContext>) {
    super(`Monitor stopped: ${monitor}`, 'MONITOR_STOPPED', { ...context, monitor });
  }
}

// Error type guard
export function isMonitorError(error: unknown): error is MonitorError {
  return error instanceof MonitorError;
}

// Error handler helper
export function handleError(error: unknown, operation = 'unknown'): MonitorError {
  if (isMonitorError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MonitorError(error.message, 'INTERNAL_ERROR', {
      operation,
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new MonitorError('An unexpected error occurred', 'INTERNAL_ERROR', {
    operation,
    originalError: String(error),
  });
}
