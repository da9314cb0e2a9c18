/**
 * Error type definitions for the Lantern engine and CLI
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all Lantern errors.
 *
 * - hint: Tells the user HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Invalid numeric environment override (CHUNK_SIZE=abc)
 * - Invalid config option names
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: lantern config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a document id has nothing indexed under it.
 *
 * The engine itself reports not-found as `null`; the CLI turns that into
 * this error so the exit code is distinct from a validation failure.
 *
 * Exit code 4: Not found
 */
export class DocumentNotFoundError extends CLIError {
  public readonly documentId: string;

  constructor(documentId: string) {
    super(
      `Document not found: ${documentId}`,
      'Run: lantern list  to see ingested documents',
      4
    );
    this.name = 'DocumentNotFoundError';
    this.documentId = documentId;
  }
}

/**
 * Thrown for vector index misuse that cannot be degraded around,
 * e.g. a vector whose dimension differs from the index.
 *
 * Load and save failures are NOT thrown; they are logged and the
 * index continues (see VectorIndex.open).
 *
 * Exit code 5: Index error
 */
export class IndexError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'Try running: lantern status  to check the index files',
      5
    );
    this.name = 'IndexError';
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
