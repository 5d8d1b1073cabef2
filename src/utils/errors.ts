/**
 * Event Log Digest - Error Utilities
 *
 * Error taxonomy for a collection run. Per-source failures and malformed
 * records are recovered where they happen; subsystem and output failures end
 * the run with a non-zero exit code.
 */

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class DigestError extends Error {
  public readonly code: string;
  public readonly fatal: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    code: string,
    message: string,
    fatal: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DigestError';
    this.code = code;
    this.fatal = fatal;
    this.details = details;
    this.timestamp = Date.now();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// RECOVERABLE ERRORS
// =============================================================================

/**
 * A single log source could not be read (permissions, missing log).
 */
export class SourceAccessError extends DigestError {
  public readonly source: string;

  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super('SOURCE_ACCESS_ERROR', `${source}: ${message}`, false, { ...details, source });
    this.name = 'SourceAccessError';
    this.source = source;
  }
}

/**
 * A raw record is missing a field or carries one of the wrong shape.
 */
export class MalformedRecordError extends DigestError {
  public readonly field: string;

  constructor(field: string, message: string, details?: Record<string, unknown>) {
    super('MALFORMED_RECORD', message, false, { ...details, field });
    this.name = 'MalformedRecordError';
    this.field = field;
  }
}

/**
 * The assembled document did not survive serialization and validation.
 */
export class SerializationError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SERIALIZATION_ERROR', message, false, details);
    this.name = 'SerializationError';
  }
}

/**
 * An operation did not finish within its time budget.
 */
export class TimeoutError extends DigestError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `Operation '${operation}' timed out after ${timeoutMs}ms`, false, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// FATAL ERRORS
// =============================================================================

/**
 * The event log facility itself is unreachable.
 */
export class EventSubsystemError extends DigestError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error, details?: Record<string, unknown>) {
    super('EVENT_SUBSYSTEM_ERROR', message, true, {
      ...details,
      originalMessage: originalError?.message,
    });
    this.name = 'EventSubsystemError';
    this.originalError = originalError;
  }
}

/**
 * The output document could not be written.
 */
export class OutputWriteError extends DigestError {
  public readonly path: string;

  constructor(path: string, message: string, details?: Record<string, unknown>) {
    super('OUTPUT_WRITE_ERROR', `Cannot write ${path}: ${message}`, true, { ...details, path });
    this.name = 'OutputWriteError';
    this.path = path;
  }
}

/**
 * Invalid configuration value.
 */
export class ConfigError extends DigestError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`, true, { issues });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * A previously written document could not be loaded.
 */
export class DocumentReadError extends DigestError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super('DOCUMENT_READ_ERROR', `${message}: ${path}`, true, { path });
    this.name = 'DocumentReadError';
    this.path = path;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Check if an error is a DigestError
 */
export function isDigestError(error: unknown): error is DigestError {
  return error instanceof DigestError;
}

/**
 * Wrap unknown errors in DigestError
 */
export function wrapError(error: unknown): DigestError {
  if (isDigestError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new DigestError('INTERNAL_ERROR', error.message, true, {
      originalName: error.name,
      stack: error.stack,
    });
  }

  return new DigestError('INTERNAL_ERROR', String(error), true);
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Timeout wrapper for async operations
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  operationName: string = 'operation'
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
