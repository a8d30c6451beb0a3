/*
 * Where in the configuration (or in the file list) an error originated.
 * Rendered into the message so a user can find the entry without --verbose.
 */
export interface ErrorContext {
  source?: string;
  group?: string;
  rule?: string;
  file?: string;
}

function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  if (context.group) parts.push(`group '${context.group}'`);
  if (context.rule) parts.push(`rule '${context.rule}'`);
  if (context.file) parts.push(`file '${context.file}'`);
  if (context.source) parts.push(`in ${context.source}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

// Base error class for all onebundle errors
export class BundleError extends Error {
  public readonly context: ErrorContext;

  constructor(message: string, public readonly code: string, context: ErrorContext = {}) {
    super(`${message}${describeContext(context)}`);
    this.name = 'BundleError';
    this.context = context;
  }
}

// Validation error for schema validation failures
export class ValidationError extends BundleError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

// Configuration error for preset document issues
export class ConfigError extends BundleError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

// A per-file failure promoted to a run failure (--strict)
export class ProcessingError extends BundleError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'PROCESSING_ERROR', context);
    this.name = 'ProcessingError';
  }
}

export class ConfigTooLargeError extends BundleError {
  constructor(
    public readonly sizeBytes: number,
    public readonly limitBytes: number,
    context: ErrorContext = {}
  ) {
    super(`Preset document is ${sizeBytes} bytes, limit is ${limitBytes} bytes`, 'CONFIG_TOO_LARGE', context);
    this.name = 'ConfigTooLargeError';
  }
}

export class InvalidProcessorNameError extends BundleError {
  constructor(public readonly processorName: string, context: ErrorContext = {}) {
    super(
      `Invalid custom processor name '${processorName}': only letters, digits and underscores are allowed`,
      'INVALID_PROCESSOR_NAME',
      context
    );
    this.name = 'InvalidProcessorNameError';
  }
}

export class PathEscapesRootError extends BundleError {
  constructor(
    public readonly offendingPath: string,
    public readonly root: string,
    context: ErrorContext = {}
  ) {
    super(`Path '${offendingPath}' resolves outside the project root ${root}`, 'PATH_ESCAPES_ROOT', context);
    this.name = 'PathEscapesRootError';
  }
}

export class UnsupportedPatternSyntaxError extends BundleError {
  constructor(public readonly pattern: string, context: ErrorContext = {}) {
    super(
      `Negation patterns are not supported: '${pattern}'. ` +
        'Remove the leading "!" and move the path to exclude_patterns instead',
      'UNSUPPORTED_PATTERN_SYNTAX',
      context
    );
    this.name = 'UnsupportedPatternSyntaxError';
  }
}

export class UnknownProcessorError extends BundleError {
  constructor(
    public readonly processorName: string | null,
    public readonly available: string[],
    context: ErrorContext = {}
  ) {
    const label = processorName === null ? 'No custom processor configured' : `Unknown custom processor '${processorName}'`;
    super(`${label}. Available processors: ${available.join(', ') || 'none'}`, 'UNKNOWN_PROCESSOR', context);
    this.name = 'UnknownProcessorError';
  }
}

export class ProcessorExecutionError extends BundleError {
  constructor(
    public readonly processorName: string,
    public override readonly cause: unknown,
    context: ErrorContext = {}
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Custom processor '${processorName}' failed: ${reason}`, 'PROCESSOR_EXECUTION_ERROR', context);
    this.name = 'ProcessorExecutionError';
  }
}

export class SecurityCheckError extends BundleError {
  constructor(public readonly findings: string[], context: ErrorContext = {}) {
    super(`Possible secrets detected: ${findings.join(', ')}`, 'SECURITY_CHECK_FAILED', context);
    this.name = 'SecurityCheckError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
