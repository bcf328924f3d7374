/**
 * packages/node/src/render.ts — printf-style message rendering.
 *
 * Why: A pack only carries a format reference and typed commands. Turning
 * them into text happens here, at the backend, where redaction and object
 * descriptions can be applied. Arguments are consumed strictly in order;
 * a conversion with no command left renders a placeholder instead of
 * failing the whole record.
 *
 * Supported: %% , %{annotations}, flags "-+ #0", width and precision (digits
 * or `*`), length modifiers (parsed and ignored: sizes come from the
 * command), conversions d i u x X o c p s S @ P m f F e E g G.
 */

import { getSystemErrorName } from "node:util";
import {
  COMMAND_FLAG_PRIVATE,
  COMMAND_TYPE_COUNT,
  COMMAND_TYPE_DATA,
  COMMAND_TYPE_ERRNO,
  COMMAND_TYPE_OBJECT,
  COMMAND_TYPE_SCALAR,
  COMMAND_TYPE_STRING,
  COMMAND_TYPE_WIDE_STRING,
  type ObjectHandleTable,
} from "@tracepack/core";
import type { DecodedCommand } from "./packDecode.js";

export const PRIVATE_PLACEHOLDER = "<private>";
export const MISSING_PLACEHOLDER = "<missing>";
export const INVALID_PLACEHOLDER = "<invalid>";
export const COLLECTED_PLACEHOLDER = "<collected>";

export type RenderContext = Readonly<{
  savedErrno: number;
  redactPrivate: boolean;
  objects: ObjectHandleTable;
}>;

type Directive = Readonly<{
  annotations: readonly string[];
  flags: string;
  width: number | "*" | null;
  precision: number | "*" | null;
  conversion: string;
}>;

/** Either plain text, or a number whose digits may be zero-padded after sign and prefix. */
type Formatted =
  | Readonly<{ kind: "text"; text: string }>
  | Readonly<{ kind: "number"; sign: string; prefix: string; digits: string; zeroPad: boolean }>;

const FLAG_CHARS = "-+ #0";
const LENGTH_MODIFIERS = ["hh", "ll", "h", "l", "q", "j", "z", "t", "L"] as const;

const utf8 = new TextDecoder("utf-8");
const utf16 = new TextDecoder("utf-16le");

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function readNumber(format: string, start: number): Readonly<{ value: number; end: number }> {
  let end = start;
  while (isDigit(format[end])) end++;
  return { value: Number(format.slice(start, end)), end };
}

function parseDirective(
  format: string,
  start: number,
): Readonly<{ directive: Directive; end: number }> | null {
  let i = start;
  let annotations: string[] = [];

  if (format[i] === "{") {
    const close = format.indexOf("}", i);
    if (close < 0) return null;
    annotations = format
      .slice(i + 1, close)
      .split(",")
      .map((a) => a.trim().toLowerCase())
      .filter((a) => a.length > 0);
    i = close + 1;
  }

  let flags = "";
  while (i < format.length && FLAG_CHARS.includes(format[i] ?? "")) {
    flags += format[i] ?? "";
    i++;
  }

  let width: number | "*" | null = null;
  if (format[i] === "*") {
    width = "*";
    i++;
  } else if (isDigit(format[i])) {
    const n = readNumber(format, i);
    width = n.value;
    i = n.end;
  }

  let precision: number | "*" | null = null;
  if (format[i] === ".") {
    i++;
    if (format[i] === "*") {
      precision = "*";
      i++;
    } else {
      const n = readNumber(format, i);
      precision = n.end > i ? n.value : 0;
      i = n.end;
    }
  }

  for (const mod of LENGTH_MODIFIERS) {
    if (format.startsWith(mod, i)) {
      i += mod.length;
      break;
    }
  }

  const conversion = format[i];
  if (conversion === undefined || !/[A-Za-z@]/.test(conversion)) return null;
  return { directive: { annotations, flags, width, precision, conversion }, end: i + 1 };
}

// =============================================================================
// Payload readers
// =============================================================================

function readUnsigned(payload: Uint8Array): bigint | null {
  const n = payload.byteLength;
  if (n !== 1 && n !== 2 && n !== 4 && n !== 8 && n !== 16) return null;
  let v = 0n;
  for (let i = n - 1; i >= 0; i--) {
    v = (v << 8n) | BigInt(payload[i] ?? 0);
  }
  return v;
}

function readInteger(cmd: DecodedCommand, signed: boolean): bigint | null {
  if (cmd.type !== COMMAND_TYPE_SCALAR && cmd.type !== COMMAND_TYPE_COUNT) return null;
  const v = readUnsigned(cmd.payload);
  if (v === null) return null;
  return signed ? BigInt.asIntN(cmd.payload.byteLength * 8, v) : v;
}

function readDouble(cmd: DecodedCommand): number | null {
  if (cmd.type !== COMMAND_TYPE_SCALAR) return null;
  const p = cmd.payload;
  const dv = new DataView(p.buffer, p.byteOffset, p.byteLength);
  if (p.byteLength === 8) return dv.getFloat64(0, true);
  if (p.byteLength === 4) return dv.getFloat32(0, true);
  return null;
}

function cString(payload: Uint8Array): string {
  const nul = payload.indexOf(0);
  return utf8.decode(nul < 0 ? payload : payload.subarray(0, nul));
}

function hexBytes(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) out += b.toString(16).padStart(2, "0");
  return out;
}

/** Symbolic name for an errno value, like `%m` prints. */
export function describeErrno(code: number): string {
  if (code === 0) return "Success";
  if (code > 0 && Number.isInteger(code)) return getSystemErrorName(-code);
  return `errno ${String(code)}`;
}

// =============================================================================
// Number formatting (C semantics)
// =============================================================================

function signOf(negative: boolean, flags: string): string {
  if (negative) return "-";
  if (flags.includes("+")) return "+";
  if (flags.includes(" ")) return " ";
  return "";
}

function formatInteger(v: bigint, d: Directive, precision: number | null): Formatted {
  const conv = d.conversion;
  const signed = conv === "d" || conv === "i";
  const negative = v < 0n;
  const mag = negative ? -v : v;
  const base = conv === "x" || conv === "X" ? 16 : conv === "o" ? 8 : 10;

  let digits = mag.toString(base);
  if (conv === "X") digits = digits.toUpperCase();
  if (precision !== null) {
    digits = precision === 0 && mag === 0n ? "" : digits.padStart(precision, "0");
  }

  let prefix = "";
  if (d.flags.includes("#")) {
    if (base === 16 && mag !== 0n) prefix = conv === "X" ? "0X" : "0x";
    if (base === 8 && !digits.startsWith("0")) prefix = "0";
  }

  return {
    kind: "number",
    sign: signed ? signOf(negative, d.flags) : "",
    prefix,
    digits,
    zeroPad: precision === null,
  };
}

function trimFraction(s: string): string {
  return s.includes(".") ? s.replace(/\.?0+$/, "") : s;
}

function fixed(mag: number, precision: number): string {
  if (mag < 1e21) return mag.toFixed(Math.min(precision, 100));
  // toFixed switches to exponent form here; doubles this large are integers.
  const whole = BigInt(mag).toString();
  return precision > 0 ? `${whole}.${"0".repeat(precision)}` : whole;
}

function exponent(mag: number, precision: number, alt: boolean): string {
  const [mantissa = "0", exp = "+0"] = mag.toExponential(Math.min(precision, 100)).split("e");
  const e = Number(exp);
  const expText = `${e < 0 ? "-" : "+"}${String(Math.abs(e)).padStart(2, "0")}`;
  const m = alt && precision === 0 ? `${mantissa}.` : mantissa;
  return `${m}e${expText}`;
}

function general(mag: number, precision: number, alt: boolean): string {
  const p = precision === 0 ? 1 : precision;
  const x = mag === 0 ? 0 : Number(mag.toExponential(Math.min(p - 1, 100)).split("e")[1] ?? "0");
  if (p > x && x >= -4) {
    const text = fixed(mag, p - 1 - x);
    return alt ? text : trimFraction(text);
  }
  const text = exponent(mag, p - 1, alt);
  if (alt) return text;
  const [mantissa = "0", exp = "+00"] = text.split("e");
  return `${trimFraction(mantissa)}e${exp}`;
}

function formatDouble(v: number, d: Directive, precision: number | null): Formatted {
  const upper = d.conversion === d.conversion.toUpperCase();
  const negative = v < 0 || Object.is(v, -0);
  const sign = signOf(negative, d.flags);

  if (Number.isNaN(v)) return { kind: "text", text: upper ? "NAN" : "nan" };
  const mag = Math.abs(v);
  if (!Number.isFinite(mag)) return { kind: "text", text: `${sign}${upper ? "INF" : "inf"}` };

  const p = precision ?? 6;
  const alt = d.flags.includes("#");
  let body: string;
  switch (d.conversion.toLowerCase()) {
    case "f":
      body = fixed(mag, p);
      if (alt && p === 0) body += ".";
      break;
    case "e":
      body = exponent(mag, p, alt);
      break;
    default:
      body = general(mag, p, alt);
      break;
  }
  return {
    kind: "number",
    sign,
    prefix: "",
    digits: upper ? body.toUpperCase() : body,
    zeroPad: true,
  };
}

// =============================================================================
// Directive rendering
// =============================================================================

function pad(value: Formatted, d: Directive, width: number, leftAlign: boolean): string {
  if (value.kind === "text") {
    return leftAlign ? value.text.padEnd(width) : value.text.padStart(width);
  }
  const head = value.sign + value.prefix;
  if (leftAlign) return (head + value.digits).padEnd(width);
  if (value.zeroPad && d.flags.includes("0")) {
    return head + value.digits.padStart(Math.max(0, width - head.length), "0");
  }
  return (head + value.digits).padStart(width);
}

function text(s: string): Formatted {
  return { kind: "text", text: s };
}

function clipChars(s: string, precision: number | null): string {
  if (precision === null) return s;
  return Array.from(s).slice(0, precision).join("");
}

function formatCommand(
  cmd: DecodedCommand,
  d: Directive,
  precision: number | null,
  ctx: RenderContext,
): Formatted | null {
  switch (d.conversion) {
    case "d":
    case "i": {
      const v = readInteger(cmd, true);
      if (v === null) return null;
      if (d.annotations.includes("bool")) return text(v !== 0n ? "true" : "false");
      return formatInteger(v, d, precision);
    }
    case "u":
    case "x":
    case "X":
    case "o": {
      const v = readInteger(cmd, false);
      return v === null ? null : formatInteger(v, d, precision);
    }
    case "c": {
      const v = readInteger(cmd, false);
      if (v === null || v > 0x10ffffn) return null;
      return text(String.fromCodePoint(Number(v)));
    }
    case "p": {
      if (cmd.type !== COMMAND_TYPE_SCALAR && cmd.type !== COMMAND_TYPE_OBJECT) return null;
      const v = readUnsigned(cmd.payload);
      return v === null ? null : text(`0x${v.toString(16)}`);
    }
    case "f":
    case "F":
    case "e":
    case "E":
    case "g":
    case "G": {
      const v = readDouble(cmd);
      return v === null ? null : formatDouble(v, d, precision);
    }
    case "s":
    case "S":
      if (cmd.type === COMMAND_TYPE_STRING) return text(clipChars(cString(cmd.payload), precision));
      if (cmd.type === COMMAND_TYPE_WIDE_STRING) {
        return text(clipChars(utf16.decode(cmd.payload), precision));
      }
      return null;
    case "@": {
      if (cmd.type === COMMAND_TYPE_STRING) return text(cString(cmd.payload));
      if (cmd.type !== COMMAND_TYPE_OBJECT) return null;
      const handle = readUnsigned(cmd.payload);
      if (handle === null) return null;
      if (handle === 0n) return text("(null)");
      return text(ctx.objects.describe(handle) ?? COLLECTED_PLACEHOLDER);
    }
    case "P": {
      if (cmd.type !== COMMAND_TYPE_DATA) return null;
      const n = precision === null ? cmd.payload.byteLength : precision;
      return text(`<${hexBytes(cmd.payload.subarray(0, n))}>`);
    }
    case "m":
      return cmd.type === COMMAND_TYPE_ERRNO ? text(describeErrno(ctx.savedErrno)) : null;
    default:
      return null;
  }
}

function starValue(cmd: DecodedCommand | undefined): number | null {
  if (cmd === undefined) return null;
  const v = readInteger(cmd, true);
  if (v === null || v > 0x7fff_ffffn || v < -0x8000_0000n) return null;
  return Number(v);
}

function isRedacted(cmd: DecodedCommand, ctx: RenderContext): boolean {
  return ctx.redactPrivate && (cmd.flags & COMMAND_FLAG_PRIVATE) !== 0;
}

/**
 * Render `format` against the decoded commands of one pack.
 */
export function renderMessage(
  format: string,
  commands: readonly DecodedCommand[],
  ctx: RenderContext,
): string {
  let out = "";
  let next = 0;
  const take = (): DecodedCommand | undefined => {
    const cmd = commands[next];
    if (cmd !== undefined) next++;
    return cmd;
  };

  let i = 0;
  while (i < format.length) {
    const pct = format.indexOf("%", i);
    if (pct < 0) {
      out += format.slice(i);
      break;
    }
    out += format.slice(i, pct);
    if (format[pct + 1] === "%") {
      out += "%";
      i = pct + 2;
      continue;
    }

    const parsed = parseDirective(format, pct + 1);
    if (parsed === null) {
      out += "%";
      i = pct + 1;
      continue;
    }
    i = parsed.end;
    const d = parsed.directive;

    let leftAlign = d.flags.includes("-");
    let width = 0;
    if (d.width === "*") {
      const w = starValue(take());
      if (w === null) {
        out += MISSING_PLACEHOLDER;
        continue;
      }
      if (w < 0) leftAlign = true;
      width = Math.abs(w);
    } else if (d.width !== null) {
      width = d.width;
    }

    let precision: number | null = null;
    if (d.precision === "*") {
      const p = starValue(take());
      if (p === null) {
        out += MISSING_PLACEHOLDER;
        continue;
      }
      precision = p < 0 ? null : p;
    } else {
      precision = d.precision;
    }

    const cmd = take();
    if (cmd === undefined) {
      out += MISSING_PLACEHOLDER;
      continue;
    }
    if (isRedacted(cmd, ctx)) {
      out += pad(text(PRIVATE_PLACEHOLDER), d, width, leftAlign);
      continue;
    }
    const formatted = formatCommand(cmd, d, precision, ctx);
    out += pad(formatted ?? text(INVALID_PLACEHOLDER), d, width, leftAlign);
  }
  return out;
}
