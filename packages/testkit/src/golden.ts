import { AssertionError } from "node:assert";

/**
 * Hex dump with 16 bytes per line: "0000: 2a 00 00 00 ...".
 */
export function hexdump(bytes: Uint8Array): string {
  const lines: string[] = [];
  for (let off = 0; off < bytes.byteLength; off += 16) {
    const row = bytes.subarray(off, Math.min(off + 16, bytes.byteLength));
    const hex = Array.from(row, (b) => b.toString(16).padStart(2, "0")).join(" ");
    lines.push(`${off.toString(16).padStart(4, "0")}: ${hex}`);
  }
  return lines.join("\n");
}

function firstMismatch(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.byteLength, b.byteLength);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return i;
  }
  return a.byteLength === b.byteLength ? -1 : n;
}

/**
 * Byte-exact comparison that reports the first differing offset with hex dumps.
 */
export function assertBytesEqual(actual: Uint8Array, expected: Uint8Array, label?: string): void {
  const at = firstMismatch(actual, expected);
  if (at < 0) return;
  const prefix = label ? `${label}: ` : "";
  throw new AssertionError({
    message: `${prefix}bytes differ at offset ${String(at)} (actual ${String(actual.byteLength)} bytes, expected ${String(expected.byteLength)} bytes)\nactual:\n${hexdump(actual)}\nexpected:\n${hexdump(expected)}`,
    actual: Array.from(actual),
    expected: Array.from(expected),
    operator: "assertBytesEqual",
  });
}
