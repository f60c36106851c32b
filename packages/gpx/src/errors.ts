/**
 * Error thrown when GPX parsing fails
 */
export class GpxParseError extends Error {
  constructor(
    message: string,
    public readonly reason: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(message);
    this.name = 'GpxParseError';
  }
}
