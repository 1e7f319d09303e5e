/**
 * Destinations for serialized graph records.
 * Writes are synchronous: the hook that produced a record sees a failure
 * before it returns.
 */

import { closeSync, openSync, writeSync } from "node:fs";
import { type Result, Ok, tryCatch } from "@codegraph/core";
import { type RecorderError, recorderError } from "./errors.js";

/** Destination value meaning "write to standard output". */
export const STDOUT_DESTINATION = "stdout";

export type SinkMode = "truncate" | "append";

export interface Sink {
  /** Human-readable name used in error messages */
  readonly destination: string;
  /** Write one complete record line, terminator included */
  write(line: string): void;
  close(): void;
}

const STDOUT_FD = 1;

const RETRY_MIN_MS = 1;
const RETRY_MAX_MS = 50;

export type WriteFn = (fd: number, buffer: Buffer, offset: number, length: number) => number;

const pauseCell = new Int32Array(new SharedArrayBuffer(4));

function pauseSync(ms: number): void {
  Atomics.wait(pauseCell, 0, 0, ms);
}

/**
 * Write all of `data`, blocking the caller until it is out. A non-blocking
 * pipe on stdout reports EAGAIN while full; the write is retried after a
 * pause that doubles up to RETRY_MAX_MS.
 */
export function writeFully(
  fd: number,
  data: string,
  write: WriteFn = (f, buffer, offset, length) => writeSync(f, buffer, offset, length),
  pause: (ms: number) => void = pauseSync
): void {
  const buffer = Buffer.from(data, "utf8");
  let offset = 0;
  let delay = RETRY_MIN_MS;
  while (offset < buffer.length) {
    try {
      offset += write(fd, buffer, offset, buffer.length - offset);
      delay = RETRY_MIN_MS;
    } catch (e) {
      if (!(e instanceof Error && "code" in e && e.code === "EAGAIN")) throw e;
      pause(delay);
      delay = Math.min(delay * 2, RETRY_MAX_MS);
    }
  }
}

export class FileSink implements Sink {
  private fd: number | null;

  constructor(readonly destination: string, mode: SinkMode = "truncate") {
    this.fd = openSync(destination, mode === "append" ? "a" : "w");
  }

  write(line: string): void {
    if (this.fd === null) {
      throw new Error("sink is closed");
    }
    writeFully(this.fd, line);
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

export class StdoutSink implements Sink {
  readonly destination = STDOUT_DESTINATION;

  write(line: string): void {
    writeFully(STDOUT_FD, line);
  }

  close(): void {
    // stdout outlives the recorder
  }
}

/**
 * Keeps every line in memory. Used by tests and by hosts that consume
 * the graph in-process.
 */
export class MemorySink implements Sink {
  readonly destination = "memory";
  readonly lines: string[] = [];
  closed = false;

  write(line: string): void {
    if (this.closed) {
      throw new Error("sink is closed");
    }
    this.lines.push(line);
  }

  close(): void {
    this.closed = true;
  }

  get text(): string {
    return this.lines.join("");
  }
}

/**
 * Open the sink named by `destination`: the stdout sentinel or a file path.
 */
export function openSink(destination: string, mode: SinkMode = "truncate"): Result<Sink, RecorderError> {
  if (destination === STDOUT_DESTINATION) {
    return Ok(new StdoutSink());
  }
  return tryCatch<Sink, RecorderError>(
    () => new FileSink(destination, mode),
    (e) => recorderError("SINK_OPEN_FAILED", `Cannot open graph output ${destination}: ${e.message}`, e)
  );
}
