/**
 * Tenant ids from a free-form metadata value.
 * Accepts a single string or an array; non-string and empty entries are ignored.
 */
export function extractTagTenants(value: unknown): string[] {
  if (typeof value === "string") {
    return value ? [value] : [];
  }
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string" && entry !== "");
  }
  return [];
}

export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}
