export const SSE_DONE = "[DONE]";

/**
 * Payloads of the `data:` lines in a server-sent event stream.
 * Other fields and blank lines are dropped.
 */
export async function* readSseData(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = "";

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });
    let newline = buffer.indexOf("\n");
    while (newline >= 0) {
      const data = dataOf(buffer.slice(0, newline));
      buffer = buffer.slice(newline + 1);
      if (data !== undefined) {
        yield data;
      }
      newline = buffer.indexOf("\n");
    }
  }

  const rest = dataOf(buffer + decoder.decode());
  if (rest !== undefined) {
    yield rest;
  }
}

export function formatSseEvent(data: string): string {
  return `data: ${data}\n\n`;
}

function dataOf(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith("data:")) {
    return undefined;
  }
  const data = trimmed.slice("data:".length).trim();
  return data === "" ? undefined : data;
}
