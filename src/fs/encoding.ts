/**
 * Conversions between caller-supplied content and stored bytes
 */

import type { BufferEncoding, FileContent } from "./interface.js";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * Convert content to bytes. Strings are utf8 unless an encoding is given.
 * Byte input is copied so callers cannot mutate stored content.
 */
export function toBytes(
  content: FileContent | undefined,
  encoding?: BufferEncoding,
): Uint8Array {
  if (content === undefined) return new Uint8Array(0);
  if (content instanceof Uint8Array) return new Uint8Array(content);

  if (!encoding || encoding === "utf8" || encoding === "utf-8") {
    return textEncoder.encode(content);
  }
  return new Uint8Array(Buffer.from(content, encoding));
}

/**
 * Decode bytes to a string (utf8 unless an encoding is given)
 */
export function fromBytes(bytes: Uint8Array, encoding?: BufferEncoding): string {
  if (!encoding || encoding === "utf8" || encoding === "utf-8") {
    return textDecoder.decode(bytes);
  }
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    encoding,
  );
}

/**
 * Concatenate two byte sequences into a fresh array
 */
export function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const combined = new Uint8Array(head.length + tail.length);
  combined.set(head);
  combined.set(tail, head.length);
  return combined;
}
