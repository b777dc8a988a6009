const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const CR = 0x0d;
export const LF = 0x0a;
export const CRLF = Uint8Array.of(CR, LF);

export function concat(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

export function utf8Encode(str: string): Uint8Array {
  return encoder.encode(str);
}

export function utf8Decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Map bytes 1:1 onto a string (one char per byte).
 *
 * Used where bytes need to act as a Map key.
 */
export function bytesToBinaryString(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i < bytes.length; i += 0x8000) {
    out += String.fromCharCode(...bytes.subarray(i, i + 0x8000));
  }
  return out;
}

export function binaryStringToBytes(str: string): Uint8Array {
  const out = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    out[i] = str.charCodeAt(i);
  }
  return out;
}

/** Index of the first CR LF at or after `from` and ending before `to`, or -1. */
export function indexOfCrlf(buf: Uint8Array, from: number, to = buf.length): number {
  const limit = Math.min(to, buf.length);
  for (let i = from; i + 1 < limit; i++) {
    if (buf[i] === CR && buf[i + 1] === LF) return i;
  }
  return -1;
}
