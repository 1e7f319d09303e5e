import { describe, it, expect } from "vitest";
import { EventWriter, serializeRecord } from "../src/EventWriter.js";
import { PathFilter } from "../src/PathFilter.js";
import { MemorySink, type Sink } from "../src/sinks.js";
import { SinkWriteError } from "../src/errors.js";

class FailingSink implements Sink {
  readonly destination = "/mnt/full/graph.jsonl";

  write(): void {
    throw new Error("ENOSPC: no space left on device");
  }

  close(): void {}
}

describe("serializeRecord", () => {
  it("writes one JSON object terminated by a newline", () => {
    expect(serializeRecord({ type: "call", caller: "a.f", callee: "b.g", file: "/p/a.py" })).toBe(
      '{"type":"call","caller":"a.f","callee":"b.g","file":"/p/a.py"}\n'
    );
  });

  it("escapes names as JSON strings", () => {
    expect(serializeRecord({ type: "class_def", fullname: 'weird"name\n', file: "/p/a.py" })).toBe(
      '{"type":"class_def","fullname":"weird\\"name\\n","file":"/p/a.py"}\n'
    );
  });
});

describe("EventWriter", () => {
  it("is disabled until configured", () => {
    const writer = new EventWriter();
    expect(writer.enabled).toBe(false);
    expect(writer.emit({ type: "module", module: "m" }, "/p/m.py", "/p/m.py")).toBe(false);
  });

  it("writes in-scope events with the emitting file attached", () => {
    const writer = new EventWriter();
    const sink = new MemorySink();
    writer.configure(sink, new PathFilter(["/proj"]));

    const written = writer.emit(
      { type: "class_ref", src: "lib.X", dst: "proj.m.Y", kind: "INHERITANCE" },
      "/proj/m.py",
      "/lib/x.py"
    );

    expect(written).toBe(true);
    expect(sink.lines).toEqual([
      '{"type":"class_ref","src":"lib.X","dst":"proj.m.Y","kind":"INHERITANCE","file":"/lib/x.py"}\n',
    ]);
  });

  it("skips events whose scope file is out of scope", () => {
    const writer = new EventWriter();
    const sink = new MemorySink();
    writer.configure(sink, new PathFilter(["/proj"]));

    expect(writer.emit({ type: "function_def", fullname: "lib.f" }, "/lib/f.py", "/lib/f.py")).toBe(false);
    expect(sink.lines).toEqual([]);
  });

  it("ignores a second configuration", () => {
    const writer = new EventWriter();
    const first = new MemorySink();
    const second = new MemorySink();

    expect(writer.configure(first, new PathFilter())).toBe(true);
    expect(writer.configure(second, new PathFilter(["/elsewhere"]))).toBe(false);

    writer.emit({ type: "module", module: "m" }, "/p/m.py", "/p/m.py");
    expect(first.lines).toHaveLength(1);
    expect(second.lines).toHaveLength(0);
  });

  it("raises SinkWriteError when the sink fails", () => {
    const writer = new EventWriter();
    writer.configure(new FailingSink(), new PathFilter());

    let caught: unknown;
    try {
      writer.emit({ type: "module", module: "m" }, "/p/m.py", "/p/m.py");
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(SinkWriteError);
    if (caught instanceof SinkWriteError) {
      expect(caught.destination).toBe("/mnt/full/graph.jsonl");
      expect(caught.message).toBe(
        "Failed to write graph record to /mnt/full/graph.jsonl: ENOSPC: no space left on device"
      );
    }
  });

  it("closes the sink and stops writing", () => {
    const writer = new EventWriter();
    const sink = new MemorySink();
    writer.configure(sink, new PathFilter());

    writer.close();

    expect(sink.closed).toBe(true);
    expect(writer.enabled).toBe(false);
    expect(writer.emit({ type: "module", module: "m" }, "/p/m.py", "/p/m.py")).toBe(false);
  });
});
