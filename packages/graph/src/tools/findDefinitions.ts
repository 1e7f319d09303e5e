/**
 * graph_find_definitions - Search class and function definitions by name.
 */

import * as z from "zod/v4";
import { type ToolResponse, dataResponse, resultToResponse } from "@codegraph/core";
import type { GraphService } from "../GraphService.js";
import type { Definition } from "../model.js";
import type { ToolRegistrar } from "./types.js";

const InputSchema = {
  pattern: z.string().describe("Case-insensitive regex matched against fully-qualified names"),
  kind: z.enum(["class", "function"]).optional().describe("Only classes or only functions"),
  limit: z.number().int().positive().optional().describe("Maximum results (default 100)"),
};

const Input = z.object(InputSchema);

const SHOWN_PER_FILE = 20;

function formatDefinitions(defs: Definition[]): string {
  if (defs.length === 0) {
    return "No definitions found matching criteria";
  }

  const lines = [`## Found ${defs.length} definition(s)`, ""];

  const byFile = new Map<string, Definition[]>();
  for (const def of defs) {
    const group = byFile.get(def.file) ?? [];
    group.push(def);
    byFile.set(def.file, group);
  }

  for (const [file, group] of byFile) {
    lines.push(`### ${file}`, "");
    for (const def of group.slice(0, SHOWN_PER_FILE)) {
      lines.push(`- ${def.kind} **${def.fullname}**`);
    }
    if (group.length > SHOWN_PER_FILE) {
      lines.push(`  ... and ${group.length - SHOWN_PER_FILE} more`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

export function handleFindDefinitions(service: GraphService, input: z.infer<typeof Input>): ToolResponse {
  return resultToResponse(service.findDefinitions(input), (defs) =>
    dataResponse(formatDefinitions(defs), { definitions: defs })
  );
}

export const registerFindDefinitions: ToolRegistrar = (server, service) => {
  server.registerTool(
    "graph_find_definitions",
    {
      title: "Find definitions",
      description: "Search recorded class and function definitions by fully-qualified name pattern.",
      inputSchema: InputSchema,
    },
    async (input) => handleFindDefinitions(service, Input.parse(input))
  );
};
