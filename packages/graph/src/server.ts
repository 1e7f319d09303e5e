#!/usr/bin/env node
/**
 * MCP server exposing a recorded code graph to agents.
 * CODEGRAPH_GRAPH_FILE, when set, is loaded and followed at startup.
 */

import { runServer } from "@codegraph/core";
import { GraphService } from "./GraphService.js";
import { registerAllTools, type Services } from "./tools/index.js";

const graphFile = process.env.CODEGRAPH_GRAPH_FILE;

runServer<Services>({
  config: {
    name: "codegraph:graph",
    version: "0.1.0",
  },
  logPrefix: "graph",
  createServices: () => ({
    graph: new GraphService(),
  }),
  registerTools: registerAllTools,
  onStartup: (services) => {
    if (!graphFile) {
      console.error("[graph] No CODEGRAPH_GRAPH_FILE set; waiting for graph_load");
      return;
    }

    const result = services.graph.load(graphFile, { follow: true });
    if (!result.ok) {
      console.error(`[graph] Warning: Could not load ${graphFile}: ${result.error.message}`);
      console.error("[graph] Graph will not be available until loaded with graph_load.");
      return;
    }

    const stats = services.graph.store.stats();
    console.error(
      `[graph] Loaded ${result.value.records} records: ${stats.modules} modules, ${stats.calls} calls`
    );
  },
  onShutdown: (services) => {
    services.graph.dispose();
  },
});
