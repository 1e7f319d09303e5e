/**
 * graph_get_symbol - A definition with the edges recorded around it.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { SymbolInfo } from "../model.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  symbol: z.string().min(1).describe("Fully-qualified class or function name, e.g. pkg.mod.Class"),
};

const Input = z.object(InputSchema);

function formatSymbol(info: SymbolInfo): string {
  const { definition } = info;
  const lines = [
    `## ${definition.fullname}`,
    "",
    `**Kind:** ${definition.kind}`,
    `**File:** ${definition.file}`,
  ];

  if (definition.kind === "function") {
    lines.push(`**Callers:** ${info.callers.length}`, `**Callees:** ${info.callees.length}`);
    return lines.join("\n");
  }

  lines.push(`**References:** ${info.references.length}`);
  if (info.subclasses.length > 0) {
    lines.push("", "### Subclasses", "");
    for (const sub of info.subclasses) {
      lines.push(`- ${sub}`);
    }
  }
  return lines.join("\n");
}

export function handleGetSymbol(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  return resultToResponse(service.getSymbol(input.symbol), (info) =>
    dataResponse(formatSymbol(info), {
      definition: info.definition,
      callers: info.callers.length,
      callees: info.callees.length,
      references: info.references.length,
      subclasses: info.subclasses,
    })
  );
}

export const registerGetSymbol: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_get_symbol",
    {
      title: "Get symbol",
      description:
        "Look up a recorded class or function: its file, call counts for functions, and references and subclasses for classes.",
      inputSchema: InputSchema,
    },
    async (input) => handleGetSymbol(service, Input.parse(input))
  );
};
