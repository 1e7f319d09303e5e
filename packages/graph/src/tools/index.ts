/**
 * MCP tool registration for the graph package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GraphService } from "../GraphService.js";

import { registerLoad } from "./load.js";
import { registerGetStats } from "./getStats.js";
import { registerGetCallers } from "./getCallers.js";
import { registerGetCallees } from "./getCallees.js";
import { registerGetImports } from "./getImports.js";
import { registerGetClassRefs } from "./getClassRefs.js";
import { registerFindDefinitions } from "./findDefinitions.js";
import { registerGetSymbol } from "./getSymbol.js";
import { registerGetModule } from "./getModule.js";
import { registerListModules } from "./listModules.js";

export interface Services {
  graph: GraphService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { graph } = services;

  registerLoad(server, graph);
  registerGetStats(server, graph);
  registerGetCallers(server, graph);
  registerGetCallees(server, graph);
  registerGetImports(server, graph);
  registerGetClassRefs(server, graph);
  registerFindDefinitions(server, graph);
  registerGetSymbol(server, graph);
  registerGetModule(server, graph);
  registerListModules(server, graph);
}
