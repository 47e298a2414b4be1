import type { InferenceMessage } from "./inference.types.js";

// Message budgets per model family; first match wins
const CONTEXT_LIMITS: ReadonlyArray<{ markers: string[]; limit: number }> = [
  { markers: ["gpt-5"], limit: 50 },
  { markers: ["gpt-4-32k"], limit: 40 },
  { markers: ["gpt-4"], limit: 30 },
  { markers: ["gpt-3.5"], limit: 25 },
  { markers: ["o1", "o3"], limit: 20 },
  { markers: ["claude"], limit: 35 },
  { markers: ["gemini-1.5"], limit: 40 },
  { markers: ["gemini"], limit: 30 },
];

export const DEFAULT_CONTEXT_LIMIT = 20;

export function getContextLimit(modelName: string): number {
  const model = modelName.toLowerCase();
  const entry = CONTEXT_LIMITS.find(({ markers }) => markers.some((m) => model.includes(m)));
  return entry?.limit ?? DEFAULT_CONTEXT_LIMIT;
}

/**
 * Bound a conversation to the model's message budget.
 * System messages are always kept and placed first; the most recent other
 * messages fill the remaining slots, at least one of them.
 */
export function trimMessages<M extends Pick<InferenceMessage, "role">>(
  messages: readonly M[],
  modelName: string,
): M[] {
  const limit = getContextLimit(modelName);
  if (messages.length <= limit) {
    return [...messages];
  }

  const system = messages.filter((m) => m.role === "system");
  const conversation = messages.filter((m) => m.role !== "system");
  const slots = Math.max(1, limit - system.length);

  return [...system, ...conversation.slice(-slots)];
}
