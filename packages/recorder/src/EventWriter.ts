/**
 * Serializes scoped graph events to a sink. Inert until configured.
 */

import { toError } from "@codegraph/core";
import type { GraphEvent, GraphRecord } from "./model.js";
import { PathFilter } from "./PathFilter.js";
import { SinkWriteError } from "./errors.js";
import type { Sink } from "./sinks.js";

/**
 * One record, one line. `type` leads, `file` trails.
 */
export function serializeRecord(record: GraphRecord): string {
  return JSON.stringify(record) + "\n";
}

export class EventWriter {
  private sink: Sink | null = null;
  private filter: PathFilter = new PathFilter();

  get enabled(): boolean {
    return this.sink !== null;
  }

  get pathFilter(): PathFilter {
    return this.filter;
  }

  /**
   * Attach the sink and filter. Only the first call takes effect;
   * returns false when the writer was already configured.
   */
  configure(sink: Sink, filter: PathFilter): boolean {
    if (this.sink !== null) {
      return false;
    }
    this.sink = sink;
    this.filter = filter;
    return true;
  }

  /**
   * Write `event` if enabled and `scopeFile` is in scope. `emittingFile`
   * becomes the record's `file`. Returns whether a record was written.
   * @throws SinkWriteError when the sink rejects the write
   */
  emit(event: GraphEvent, scopeFile: string, emittingFile: string): boolean {
    const sink = this.sink;
    if (sink === null || !this.filter.inScope(scopeFile)) {
      return false;
    }

    const line = serializeRecord({ ...event, file: emittingFile });
    try {
      sink.write(line);
    } catch (e) {
      throw new SinkWriteError(sink.destination, toError(e));
    }
    return true;
  }

  /**
   * Close the sink and go back to the inert state.
   */
  close(): void {
    const sink = this.sink;
    this.sink = null;
    sink?.close();
  }
}
