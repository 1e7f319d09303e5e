export {
  type Result,
  Ok,
  Err,
  toError,
  tryCatch,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  errorResponse,
  dataResponse,
  resultToResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  runServer,
} from "./server.js";
