/**
 * graph_load - Load a recorded graph stream.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, errorResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  path: z.string().min(1).describe("Path to the JSON Lines file written by the recorder"),
  follow: z
    .boolean()
    .optional()
    .describe("Keep applying records the recorder appends after loading"),
};

const Input = z.object(InputSchema);

const MAX_REPORTED_INVALID = 10;

export function handleLoad(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  const result = service.load(input.path, { follow: input.follow ?? false });
  if (!result.ok) {
    return errorResponse(`Cannot load ${input.path}: ${result.error.message}`);
  }

  const { file, records, invalid } = result.value;
  const stats = service.store.stats();
  const lines = [
    "## Graph Loaded",
    "",
    `**File:** ${file}`,
    `**Records:** ${records}`,
    `**Modules:** ${stats.modules}`,
    `**Definitions:** ${stats.classDefs + stats.functionDefs}`,
    `**Edges:** ${stats.imports + stats.classRefs + stats.calls}`,
  ];

  if (invalid.length > 0) {
    lines.push("", `### Skipped ${invalid.length} invalid line(s)`, "");
    for (const bad of invalid.slice(0, MAX_REPORTED_INVALID)) {
      lines.push(`- line ${bad.line}: ${bad.error}`);
    }
    if (invalid.length > MAX_REPORTED_INVALID) {
      lines.push(`  ... and ${invalid.length - MAX_REPORTED_INVALID} more`);
    }
  }

  return dataResponse(lines.join("\n"), {
    file,
    records,
    invalidLines: invalid.length,
    following: input.follow ?? false,
    stats,
  });
}

export const registerLoad: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_load",
    {
      title: "Load graph",
      description:
        "Load a code graph recorded during type checking. Replaces any graph loaded before. Call this first.",
      inputSchema: InputSchema,
    },
    async (input) => handleLoad(service, Input.parse(input))
  );
};
