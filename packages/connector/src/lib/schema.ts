import type { z } from "zod";
import { DataError } from "./errors.js";

/**
 * Validate an API payload; an unexpected shape is a DataError naming `what`.
 */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DataError(`Unexpected ${what}${where}: ${issue.message}`);
  }
  return result.data;
}
