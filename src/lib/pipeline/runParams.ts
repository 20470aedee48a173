/**
 * Run parameters stored on a session. Unknown keys are kept for collaborators.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { SessionParams } from "../sessions/types.js";

export const RunParamsSchema = z
  .object({
    maxPapers: z.number().int().min(1).max(100).default(20),
    maxHypotheses: z.number().int().min(1).max(50).default(10),
    iterations: z.number().int().min(1).max(10).default(1),
  })
  .passthrough();

export type RunParams = z.infer<typeof RunParamsSchema>;

export function parseRunParams(params: SessionParams): RunParams {
  const parsed = RunParamsSchema.safeParse(params);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid run params: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim());
  }
  return parsed.data;
}
