/**
 * Fusion Errors
 *
 * Error categories:
 * - FORMAT_ERROR: Malformed run file line (aborts the whole fusion)
 * - CONFIG_ERROR: Invalid strategy or parameters (raised before any query is fused)
 *
 * Resource errors (unreadable input, unwritable output) are not wrapped.
 * Cancellation is not an error: it is reported through `FusionOutput.aborted`.
 */

export type FusionErrorType = 'FORMAT_ERROR' | 'CONFIG_ERROR';

export class FusionError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: FusionErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'FusionError';
    this.cause = cause;
  }
}

/**
 * A run file line that cannot be parsed.
 */
export class FormatError extends FusionError {
  constructor(
    public readonly source: string,
    public readonly line: number,
    reason: string
  ) {
    super(`${source}:${line}: ${reason}`, 'FORMAT_ERROR');
    this.name = 'FormatError';
  }
}

/**
 * Build a configuration error.
 */
export function configError(message: string): FusionError {
  return new FusionError(message, 'CONFIG_ERROR');
}
