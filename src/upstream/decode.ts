import type { z } from "zod";
import { formatZodError } from "../common/validation.utils.js";
import { DecodeFailedError } from "../errors/index.js";

/**
 * Parse an upstream JSON body against the shape we expect from it.
 * Anything else is contract drift and fails with DecodeFailed.
 */
export function decodeJson<S extends z.ZodTypeAny>(body: string, schema: S, what: string): z.output<S> {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new DecodeFailedError(what, error instanceof Error ? error.message : String(error));
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new DecodeFailedError(what, formatZodError(result.error));
  }
  return result.data;
}
