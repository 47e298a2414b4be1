import { BadRequestException } from "@nestjs/common";
import type { z, ZodError } from "zod";

/**
 * Format Zod error into user-friendly message
 */
export function formatZodError(error: ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return issues.join("; ");
}

/**
 * Validate request input, rejecting with 400 on failure
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new BadRequestException(formatZodError(result.error));
  }
  return result.data;
}
