/**
 * graph_get_callees - Call edges leaving a function.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { CallEdge } from "../model.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  symbol: z.string().min(1).describe("Fully-qualified name of the calling function"),
};

const Input = z.object(InputSchema);

export function formatCallees(symbol: string, edges: CallEdge[]): string {
  if (edges.length === 0) {
    return `No callees recorded for: ${symbol}`;
  }

  const lines = [`## Callees of ${symbol}`, "", `Found ${edges.length} callee(s):`, ""];
  for (const edge of edges) {
    lines.push(`- **${edge.callee}**`);
  }
  return lines.join("\n");
}

export function handleGetCallees(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  return resultToResponse(service.getCallees(input.symbol), (edges) =>
    dataResponse(formatCallees(input.symbol, edges), { symbol: input.symbol, callees: edges })
  );
}

export const registerGetCallees: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_get_callees",
    {
      title: "Get callees",
      description: "Find the functions a function calls. Only callees inside the recorded filter roots appear.",
      inputSchema: InputSchema,
    },
    async (input) => handleGetCallees(service, Input.parse(input))
  );
};
