/**
 * Shared types for graph tool registration.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GraphService } from "../GraphService.js";

export interface ToolRegistrar {
  (server: McpServer, service: GraphService): void;
}
