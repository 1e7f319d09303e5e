/**
 * JSON Lines parsing for recorder output.
 */

import { GraphRecordSchema, type GraphRecord } from "@codegraph/recorder";
import { type Result, Ok, Err } from "./model.js";
import type { InvalidLine } from "./model.js";

/**
 * Parse and validate one line. Fields the schema does not know are dropped.
 */
export function parseRecordLine(line: string): Result<GraphRecord, string> {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (e) {
    return Err(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = GraphRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ` : "";
    return Err(`Invalid record: ${where}${issue?.message ?? "unknown shape"}`);
  }
  return Ok(parsed.data);
}

export interface ParsedStream {
  records: GraphRecord[];
  invalid: InvalidLine[];
}

/**
 * Parse a block of JSON Lines. Blank lines are skipped; bad lines are
 * reported with their 1-based number offset by `firstLine - 1`.
 */
export function readRecords(text: string, firstLine: number = 1): ParsedStream {
  const records: GraphRecord[] = [];
  const invalid: InvalidLine[] = [];

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;

    const result = parseRecordLine(line);
    if (result.ok) {
      records.push(result.value);
    } else {
      invalid.push({ line: firstLine + i, error: result.error });
    }
  }

  return { records, invalid };
}
