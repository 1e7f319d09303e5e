/**
 * graph_list_modules - Every recorded module and its file.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { ModuleInfo } from "../model.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  pattern: z.string().optional().describe("Case-insensitive regex matched against module names"),
};

const Input = z.object(InputSchema);

function formatModules(modules: ModuleInfo[], pattern: string | undefined): string {
  if (modules.length === 0) {
    return pattern === undefined ? "No modules recorded" : `No modules match: ${pattern}`;
  }

  const lines = [`## Modules (${modules.length})`, ""];
  for (const m of modules) {
    lines.push(`- **${m.name}** - ${m.file}`);
  }
  return lines.join("\n");
}

export function handleListModules(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  return resultToResponse(service.listModules(input.pattern), (modules) =>
    dataResponse(formatModules(modules, input.pattern), { modules })
  );
}

export const registerListModules: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_list_modules",
    {
      title: "List modules",
      description: "List recorded modules with their files, sorted by name.",
      inputSchema: InputSchema,
    },
    async (input) => handleListModules(service, Input.parse(input))
  );
};
