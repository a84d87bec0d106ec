import { ReplyTooLargeError } from '../errors';
import type { ClassifiedResponse } from '../protocols/classify';

export const DEFAULT_MAX_REPLY_BYTES = 10 * 1024 * 1024;

/**
 * Buffer a single reply, refusing anything over `limit` bytes.
 *
 * A declared length over the limit is rejected before the first byte is read;
 * an undeclared one is rejected the moment the running total crosses it.
 * The body is cancelled either way and nothing partial is returned.
 */
export async function readBoundedText(classified: ClassifiedResponse, limit: number): Promise<string> {
  const declared = classified.meta.contentLength;
  if (declared !== undefined && declared > limit) {
    await classified.body.discard();
    throw new ReplyTooLargeError(limit, declared);
  }

  const stream = classified.body.take();
  if (!stream) return '';

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > limit) {
      await reader.cancel();
      throw new ReplyTooLargeError(limit);
    }
    chunks.push(value);
  }

  const bytes = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return new TextDecoder().decode(bytes);
}
