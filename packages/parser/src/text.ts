/**
 * UTF-8 helpers for moving between text and byte sources.
 */

import type { Byte } from "./types.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

/** Encode text as UTF-8 bytes. */
export function encode(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode UTF-8 bytes; invalid sequences become U+FFFD. */
export function decode(bytes: ArrayLike<Byte>): string {
  return decoder.decode(Uint8Array.from(bytes));
}
