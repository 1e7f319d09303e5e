/**
 * graph_get_module - A module's file, imports and definitions.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { ModuleDetails } from "../model.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  module: z.string().min(1).describe("Dotted module name, e.g. pkg.mod"),
};

const Input = z.object(InputSchema);

function listOrNone(names: string[]): string {
  return names.length > 0 ? names.join(", ") : "none";
}

function formatModule(details: ModuleDetails): string {
  const lines = [
    `## Module ${details.module.name}`,
    "",
    `**File:** ${details.module.file}`,
    `**Imports:** ${listOrNone(details.imports)}`,
    `**Imported by:** ${listOrNone(details.importers)}`,
  ];

  if (details.definitions.length > 0) {
    lines.push("", `### Definitions (${details.definitions.length})`, "");
    for (const def of details.definitions) {
      lines.push(`- ${def.kind} **${def.fullname}**`);
    }
  }
  return lines.join("\n");
}

export function handleGetModule(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  return resultToResponse(service.getModule(input.module), (details) =>
    dataResponse(formatModule(details), { ...details })
  );
}

export const registerGetModule: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_get_module",
    {
      title: "Get module",
      description: "Show a recorded module's file, its imports in both directions and the definitions recorded from its file.",
      inputSchema: InputSchema,
    },
    async (input) => handleGetModule(service, Input.parse(input))
  );
};
