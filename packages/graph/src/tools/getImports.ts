/**
 * graph_get_imports - Module import edges in either direction.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  module: z.string().min(1).describe("Fully-qualified module name"),
  direction: z
    .enum(["imports", "importers"])
    .optional()
    .describe("'imports': modules it imports (default). 'importers': modules importing it"),
};

const Input = z.object(InputSchema);

export function handleGetImports(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  const direction = input.direction ?? "imports";

  return resultToResponse(service.getImports(input.module, direction), (modules) => {
    const heading =
      direction === "imports" ? `## Imports of ${input.module}` : `## Modules importing ${input.module}`;
    const text =
      modules.length === 0
        ? `No ${direction} recorded for: ${input.module}`
        : [heading, "", ...modules.map((m) => `- ${m}`)].join("\n");
    return dataResponse(text, { module: input.module, direction, modules });
  });
}

export const registerGetImports: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_get_imports",
    {
      title: "Get imports",
      description: "List the modules a module imports, or the modules that import it.",
      inputSchema: InputSchema,
    },
    async (input) => handleGetImports(service, Input.parse(input))
  );
};
