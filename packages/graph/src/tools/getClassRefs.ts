/**
 * graph_get_class_refs - Inheritance and instantiation edges of a class.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import { ClassRefKindSchema } from "@codegraph/recorder";
import type { GraphService } from "../GraphService.js";
import type { ClassRefEdge } from "../model.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  symbol: z.string().min(1).describe("Fully-qualified class name"),
  direction: z
    .enum(["to", "from"])
    .optional()
    .describe("'to': references to this class (default). 'from': references made by it"),
  kinds: z
    .array(ClassRefKindSchema)
    .optional()
    .describe("Only these reference kinds, e.g. INHERITANCE, INSTANTIATION"),
};

const Input = z.object(InputSchema);

function formatRefs(symbol: string, direction: "to" | "from", edges: ClassRefEdge[]): string {
  if (edges.length === 0) {
    return `No class references recorded ${direction} ${symbol}`;
  }

  const lines = [`## References ${direction} ${symbol}`, ""];
  const byKind = new Map<string, ClassRefEdge[]>();
  for (const edge of edges) {
    const group = byKind.get(edge.kind) ?? [];
    group.push(edge);
    byKind.set(edge.kind, group);
  }

  for (const [kind, group] of byKind) {
    lines.push(`### ${kind} (${group.length})`, "");
    for (const edge of group) {
      const other = direction === "to" ? edge.src : edge.dst;
      lines.push(`- **${other}** - ${edge.file}`);
    }
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export function handleGetClassRefs(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  const direction = input.direction ?? "to";
  return resultToResponse(service.getClassRefs(input.symbol, direction, input.kinds), (edges) =>
    dataResponse(formatRefs(input.symbol, direction, edges), {
      symbol: input.symbol,
      direction,
      references: edges,
    })
  );
}

export const registerGetClassRefs: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_get_class_refs",
    {
      title: "Get class references",
      description:
        "Find subclasses and instantiations of a class, or the classes a class inherits from and creates.",
      inputSchema: InputSchema,
    },
    async (input) => handleGetClassRefs(service, Input.parse(input))
  );
};
