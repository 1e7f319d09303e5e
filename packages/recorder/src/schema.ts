/**
 * Zod schemas for the JSON Lines wire format.
 * Unknown fields are stripped, so readers tolerate additive fields.
 */

import * as z from "zod/v4";
import { CLASS_REF_KINDS } from "./model.js";

const name = z.string();
const file = z.string();

export const ClassRefKindSchema = z.enum(CLASS_REF_KINDS);

export const GraphRecordSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("module"), module: name, file }),
  z.object({ type: z.literal("import"), importer: name, importee: name, file }),
  z.object({ type: z.literal("invalidate"), module: name, file }),
  z.object({ type: z.literal("class_def"), fullname: name, file }),
  z.object({ type: z.literal("class_ref"), src: name, dst: name, kind: ClassRefKindSchema, file }),
  z.object({ type: z.literal("function_def"), fullname: name, file }),
  z.object({ type: z.literal("call"), caller: name, callee: name, file }),
]);

export type GraphRecordInput = z.infer<typeof GraphRecordSchema>;
