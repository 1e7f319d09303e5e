/**
 * graph_get_callers - Call edges landing on a function.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { CallEdge } from "../model.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  symbol: z.string().min(1).describe("Fully-qualified name of the called function, e.g. pkg.mod.func"),
};

const Input = z.object(InputSchema);

export function formatCallers(symbol: string, edges: CallEdge[]): string {
  if (edges.length === 0) {
    return `No callers recorded for: ${symbol}`;
  }

  const lines = [`## Callers of ${symbol}`, "", `Found ${edges.length} caller(s):`, ""];
  for (const edge of edges) {
    lines.push(`- **${edge.caller}** - ${edge.file}`);
  }
  return lines.join("\n");
}

export function handleGetCallers(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  return resultToResponse(service.getCallers(input.symbol), (edges) =>
    dataResponse(formatCallers(input.symbol, edges), { symbol: input.symbol, callers: edges })
  );
}

export const registerGetCallers: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_get_callers",
    {
      title: "Get callers",
      description: "Find every recorded call site that calls a function, including calls from outside the filtered project.",
      inputSchema: InputSchema,
    },
    async (input) => handleGetCallers(service, Input.parse(input))
  );
};
