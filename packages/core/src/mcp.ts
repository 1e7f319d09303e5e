/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * Shape returned from a tool handler. The index signature keeps it
 * assignable to the SDK's CallToolResult.
 */
export type ToolResponse = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

/**
 * Error response; the text is prefixed with "Error:" and flagged as a tool error.
 */
export function errorResponse(message: string): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Text plus structured data for clients that read structuredContent.
 */
export function dataResponse(text: string, data: Record<string, unknown>): ToolResponse {
  return {
    content: [{ type: "text", text }],
    structuredContent: data,
  };
}

function messageOf(error: string | Error | { message: string }): string {
  return typeof error === "string" ? error : error.message;
}

/**
 * Map a Result onto a tool response, formatting successes with `formatter`.
 */
export function resultToResponse<T, E extends string | Error | { message: string }>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  return errorResponse(messageOf(result.error));
}
