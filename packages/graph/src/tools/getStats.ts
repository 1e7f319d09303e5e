/**
 * graph_get_stats - Counts for the loaded graph.
 */

import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { ToolRegistrar } from "./types.js";

export function handleGetStats(service: GraphService): ToolResponse {
  return resultToResponse(service.getStats(), (stats) =>
    dataResponse(
      [
        "## Graph Statistics",
        "",
        `**Modules:** ${stats.modules}`,
        `**Files:** ${stats.files}`,
        `**Imports:** ${stats.imports}`,
        `**Classes:** ${stats.classDefs}`,
        `**Functions:** ${stats.functionDefs}`,
        `**Class references:** ${stats.classRefs}`,
        `**Calls:** ${stats.calls}`,
        `**Invalidations seen:** ${stats.invalidations}`,
      ].join("\n"),
      { ...stats }
    )
  );
}

export const registerGetStats: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_get_stats",
    {
      title: "Graph stats",
      description: "Counts of modules, definitions and edges in the loaded graph.",
      inputSchema: {},
    },
    async () => handleGetStats(service)
  );
};
