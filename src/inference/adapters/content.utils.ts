import type { InferenceMessage } from "../inference.types.js";

/**
 * Plain text of a message: the string itself, or its first text part
 */
export function messageText(message: InferenceMessage): string {
  if (typeof message.content === "string") {
    return message.content;
  }
  for (const part of message.content) {
    if (part.type === "text") {
      return part.text;
    }
  }
  return "";
}

export function unixSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
