/**
 * Error taxonomy. Parameter problems are raised before any external tool runs;
 * tool failures carry the binary name, exit code and captured stderr.
 */

export class FrameExtractorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'FrameExtractorError';
  }
}

export class InvalidParameterError extends FrameExtractorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'InvalidParameterError';
  }
}

export class UnsupportedFormatError extends FrameExtractorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'UnsupportedFormatError';
  }
}

export class ExternalToolError extends FrameExtractorError {
  constructor(
    message: string,
    public readonly binary: string,
    public readonly exitCode: number | null,
    public readonly stderr = '',
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'ExternalToolError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
