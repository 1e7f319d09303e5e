/**
 * Activation options for the recorder.
 */

import * as path from "node:path";
import * as z from "zod/v4";
import { type Result, Ok, Err } from "@codegraph/core";
import { type RecorderError, recorderError } from "./errors.js";

export const RecorderOptionsSchema = z.object({
  output: z.string().min(1).describe('File path, or "stdout"'),
  paths: z.array(z.string().min(1)).default([]).describe("Filter roots; empty records everything"),
  mode: z.enum(["truncate", "append"]).default("truncate"),
});

/** Options as a caller writes them */
export type RecorderOptions = z.input<typeof RecorderOptionsSchema>;

/** Options after defaults are applied */
export type ResolvedRecorderOptions = z.output<typeof RecorderOptionsSchema>;

export function parseRecorderOptions(
  options: RecorderOptions
): Result<ResolvedRecorderOptions, RecorderError> {
  const parsed = RecorderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "options"}: ${issue.message}`)
      .join("; ");
    return Err(recorderError("INVALID_OPTIONS", `Invalid recorder options: ${detail}`));
  }
  return Ok(parsed.data);
}

export const ENV_OUTPUT = "CODEGRAPH_OUTPUT";
export const ENV_PATHS = "CODEGRAPH_PATHS";
export const ENV_APPEND = "CODEGRAPH_APPEND";

/**
 * Build options from the environment. Recording is off (undefined) unless
 * CODEGRAPH_OUTPUT is set; CODEGRAPH_PATHS is split on the platform path
 * delimiter.
 */
export function optionsFromEnv(
  env: Record<string, string | undefined> = process.env
): RecorderOptions | undefined {
  const output = env[ENV_OUTPUT];
  if (!output) return undefined;

  const paths = (env[ENV_PATHS] ?? "")
    .split(path.delimiter)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const append = env[ENV_APPEND];
  const mode = append === "1" || append === "true" ? "append" : "truncate";

  return { output, paths, mode };
}
