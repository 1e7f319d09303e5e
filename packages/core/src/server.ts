/**
 * Stdio MCP server lifecycle shared by the codegraph servers.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Prefix for stderr diagnostics, e.g. "graph" logs as "[graph] ..." */
  logPrefix: string;

  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tools are registered and before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create services, register tools, install signal handlers and connect stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "codegraph:graph", version: "0.1.0" },
 *   logPrefix: "graph",
 *   createServices: () => ({ store: new GraphStore() }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, logPrefix, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({ name: config.name, version: config.version });
  registerTools(server, services);

  const shutdown = async (): Promise<void> => {
    console.error(`[${logPrefix}] Shutting down...`);
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${logPrefix}] Shutdown failed:`, error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  // stdout belongs to the transport from here on
  await server.connect(new StdioServerTransport());
  console.error(`[${logPrefix}] ${config.name} ${config.version} ready`);
}

/**
 * Entry point for server binaries: a bootstrap failure exits with status 1.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.logPrefix}] Fatal error:`, error);
    process.exit(1);
  });
}
