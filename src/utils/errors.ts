/**
 * Shared error types and helpers
 */

/**
 * Base class for every failure that aborts a generation run
 */
export class VanityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * An identifier could not be resolved to a buildable package
 */
export class PackageResolutionError extends VanityError {
  constructor(
    public readonly identifier: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * Repository detection failed for a reason other than "not a repository"
 */
export class RepositoryDetectionError extends VanityError {
  constructor(
    public readonly directory: string,
    cause: unknown
  ) {
    super(`cannot detect repository in ${directory}: ${formatError(cause)}`, { cause });
  }
}

/**
 * The -replace option could not be parsed
 */
export class RewriteConfigError extends VanityError {}

/**
 * An output directory or file could not be created or written
 */
export class OutputError extends VanityError {}

/**
 * Formats error message from unknown error type
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the `code` of a Node.js system error, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
