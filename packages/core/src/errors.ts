/**
 * Error classes for the colorize pipeline
 */

/**
 * Base error class for colorize failures
 */
export class ColorizeError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(message);
    this.name = 'ColorizeError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ColorizeError);
    }
  }
}

/**
 * Error thrown when the input file cannot be read
 */
export class InputReadError extends ColorizeError {
  constructor(
    filePath: string,
    public readonly reason: string,
  ) {
    super(`Cannot read input file ${filePath}: ${reason}`, filePath);
    this.name = 'InputReadError';
  }
}

/**
 * Error thrown when the output file cannot be written
 */
export class OutputWriteError extends ColorizeError {
  constructor(
    filePath: string,
    public readonly reason: string,
  ) {
    super(`Cannot write output file ${filePath}: ${reason}`, filePath);
    this.name = 'OutputWriteError';
  }
}

/**
 * Error thrown when the output path would overwrite the input file
 */
export class OutputPathError extends ColorizeError {
  constructor(filePath: string) {
    super(`Output path is the same as the input file: ${filePath}`, filePath);
    this.name = 'OutputPathError';
  }
}
