/**
 * Error thrown when an output file cannot be written.
 */
export class IOFailureError extends Error {
  readonly code = 'IO_FAILURE';
  readonly path: string;
  /** System error code such as ENOENT or EACCES, when known */
  readonly errno?: string;
  /** Files a failed build wrote but could not remove again */
  readonly leftoverPaths: string[] = [];

  constructor(message: string, path: string, options?: { errno?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'IOFailureError';
    this.path = path;
    this.errno = options?.errno;
    Object.setPrototypeOf(this, IOFailureError.prototype);
  }

  /**
   * Create an IOFailureError from whatever a file system call threw.
   */
  static fromError(path: string, error: unknown): IOFailureError {
    if (error instanceof IOFailureError) {
      return error;
    }

    const errno =
      error instanceof Error && 'code' in error && typeof error.code === 'string'
        ? error.code
        : undefined;
    const reason = error instanceof Error ? error.message : String(error);

    return new IOFailureError(`Failed to write ${path}: ${reason}`, path, {
      errno,
      cause: error,
    });
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): { code: string; message: string; path: string; errno?: string } {
    return {
      code: this.code,
      message: this.message,
      path: this.path,
      errno: this.errno,
    };
  }
}
