/**
 * Write at most `maxBytes` of a stream to a file, then stop reading.
 */

import { open } from 'node:fs/promises';
import type { Readable } from 'node:stream';

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk);
  }
  throw new TypeError(`Unexpected stream chunk: ${typeof chunk}`);
}

/**
 * Returns the number of bytes written. Leaving the loop early destroys the
 * source stream, which aborts the underlying transfer.
 */
export async function writeHead(source: Readable, destination: string, maxBytes: number): Promise<number> {
  const handle = await open(destination, 'w', 0o600);
  let written = 0;

  try {
    for await (const chunk of source) {
      const buffer = toBuffer(chunk);
      const slice = buffer.subarray(0, maxBytes - written);
      if (slice.length > 0) {
        await handle.write(slice);
        written += slice.length;
      }
      if (written >= maxBytes) {
        break;
      }
    }
  } finally {
    await handle.close();
  }

  return written;
}
