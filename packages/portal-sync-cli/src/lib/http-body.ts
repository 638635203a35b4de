/**
 * Helpers for consuming response bodies chunk by chunk.
 */

export function toBuffer(chunk: Uint8Array | string): Buffer {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk);
}

/**
 * Collect a whole body as UTF-8 text. Only for small pages (login forms,
 * directory listings); file payloads are always streamed.
 */
export async function readText(
  body: AsyncIterable<Uint8Array | string> | null
): Promise<string> {
  if (!body) return "";

  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8");
}
