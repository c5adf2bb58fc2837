/**
 * Standard input helpers
 */

import type { Readable } from 'node:stream';

/**
 * Read a stream to the end as raw bytes
 */
export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Read all of stdin as raw bytes
 */
export async function readStdin(): Promise<Buffer> {
  return readStream(process.stdin);
}

/**
 * True when stdin is piped or redirected rather than a terminal
 */
export function hasPipedStdin(): boolean {
  return process.stdin.isTTY !== true;
}
