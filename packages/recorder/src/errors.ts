/**
 * Recorder failures.
 * Activation problems are returned as RecorderError values;
 * a failing sink mid-run is thrown as SinkWriteError.
 */

export type RecorderErrorCode = "INVALID_OPTIONS" | "SINK_OPEN_FAILED";

export interface RecorderError {
  code: RecorderErrorCode;
  message: string;
  cause?: Error;
}

export function recorderError(
  code: RecorderErrorCode,
  message: string,
  cause?: Error
): RecorderError {
  return cause ? { code, message, cause } : { code, message };
}

/**
 * The graph stream can no longer be written. Fatal for the run:
 * every later edge would be missing from the output.
 */
export class SinkWriteError extends Error {
  readonly destination: string;

  constructor(destination: string, cause: Error) {
    super(`Failed to write graph record to ${destination}: ${cause.message}`, { cause });
    this.name = "SinkWriteError";
    this.destination = destination;
  }
}
