/**
 * packages/core/src/statement/statement.ts — Log statements as tagged templates.
 *
 * Why: Callers write `trace\`opened ${path} in ${ms} ms\`` and never see a
 * format string. The binding derives the printf-style format from the value
 * kinds and issues one encoder call per interpolated value, so the format
 * and the command stream always agree.
 *
 * Value mapping:
 *   int32                      -> %d    SCALAR(4)
 *   other safe integers        -> %lld  SCALAR(8)
 *   bigint in i64              -> %lld  SCALAR(8)
 *   bigint in (i64, u64]       -> %llu  SCALAR(8)
 *   other numbers, and -0      -> %.*g  SCALAR(4) precision + SCALAR(8) double
 *   boolean                    -> %{bool}d
 *   string                     -> %s    STRING
 *   Uint8Array                 -> %.*P  COUNT + DATA
 *   errno(code)                -> %m    ERRNO
 *   any other object           -> %@    OBJECT
 *   null / undefined           -> literal text
 */

import { U64_MAX } from "../abi.js";
import type { CommandBuffer } from "../encoder/commandBuffer.js";
import type { AppendOpts, AppendOutcome, CommandPrivacy, DropReason } from "../encoder/types.js";
import type { TraceSymbols } from "../symbols/index.js";

/** Printed in place of an argument the encoder had no room for. */
export const DROPPED_ARGUMENT = "<dropped>";

/** Digits of a double that always survive a decimal round trip. */
export const FLOAT_PRECISION = 15;

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export class ErrnoArg {
  constructor(readonly code: number) {}
}

export type TracePlainValue =
  | number
  | bigint
  | boolean
  | string
  | Uint8Array
  | object
  | null
  | undefined;

export class PrivacyArg {
  readonly value: TracePlainValue | ErrnoArg;

  constructor(
    readonly privacy: Exclude<CommandPrivacy, "auto">,
    value: TracePlainValue | ErrnoArg,
  ) {
    this.value = value instanceof PrivacyArg ? value.value : value;
  }
}

export type TraceArg = TracePlainValue | ErrnoArg | PrivacyArg;

export type LogStatement = Readonly<{
  strings: readonly string[];
  values: readonly TraceArg[];
}>;

export function trace(strings: TemplateStringsArray, ...values: TraceArg[]): LogStatement {
  return Object.freeze({ strings: Array.from(strings), values });
}

/** Statement with no arguments. Any `%` in `text` is printed literally. */
export function literal(text: string): LogStatement {
  return Object.freeze({ strings: [text], values: [] });
}

/** The error code a `%m` conversion prints. */
export function errno(code: number): ErrnoArg {
  return new ErrnoArg(Number.isInteger(code) ? code | 0 : 0);
}

export function privateValue(value: TracePlainValue | ErrnoArg | PrivacyArg): PrivacyArg {
  return new PrivacyArg("private", value);
}

export function publicValue(value: TracePlainValue | ErrnoArg | PrivacyArg): PrivacyArg {
  return new PrivacyArg("public", value);
}

export type ArgumentIssue =
  | Readonly<{ index: number; status: "dropped"; reason: DropReason }>
  | Readonly<{ index: number; status: "truncated"; bytes: number }>;

export type EncodedStatement = Readonly<{
  format: string;
  savedErrno: number;
  issues: readonly ArgumentIssue[];
}>;

type Conversion = Readonly<{
  spec: string;
  annotations: readonly string[];
  outcome: AppendOutcome;
}>;

function escapeLiteral(text: string): string {
  return text.replaceAll("%", "%%");
}

function directive(conv: Conversion): string {
  const ann = conv.annotations.length > 0 ? `{${conv.annotations.join(",")}}` : "";
  return `%${ann}${conv.spec}`;
}

function isInt32(v: number): boolean {
  return Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX;
}

/** Integers that survive an integer conversion; -0 keeps its sign only as a double. */
function isIntegral(v: number): boolean {
  return Number.isSafeInteger(v) && !Object.is(v, -0);
}

function encodeBigInt(
  buffer: CommandBuffer,
  v: bigint,
  opts: AppendOpts,
): Readonly<{ spec: string; outcome: AppendOutcome }> {
  if (v >= I64_MIN && v <= I64_MAX) return { spec: "lld", outcome: buffer.appendInt64(v, opts) };
  if (v > I64_MAX && v <= U64_MAX) return { spec: "llu", outcome: buffer.appendUint64(v, opts) };
  return { spec: "s", outcome: buffer.appendString(v.toString(), opts) };
}

function encodeValue(
  buffer: CommandBuffer,
  value: NonNullable<TracePlainValue>,
  privacy: CommandPrivacy,
  symbols: TraceSymbols,
): Conversion {
  const opts: AppendOpts = { privacy };
  const annotations: string[] = privacy === "auto" ? [] : [privacy];

  if (typeof value === "number") {
    if (isIntegral(value) && isInt32(value)) {
      return { spec: "d", annotations, outcome: buffer.appendInt32(value, opts) };
    }
    if (isIntegral(value)) {
      return { spec: "lld", annotations, outcome: buffer.appendInt64(value, opts) };
    }
    return {
      spec: ".*g",
      annotations,
      outcome: buffer.appendFloat(value, FLOAT_PRECISION, opts),
    };
  }
  if (typeof value === "bigint") {
    const { spec, outcome } = encodeBigInt(buffer, value, opts);
    return { spec, annotations, outcome };
  }
  if (typeof value === "boolean") {
    return {
      spec: "d",
      annotations: [...annotations, "bool"],
      outcome: buffer.appendInt32(value ? 1 : 0, opts),
    };
  }
  if (typeof value === "string") {
    return { spec: "s", annotations, outcome: buffer.appendString(value, opts) };
  }
  if (value instanceof Uint8Array) {
    return { spec: ".*P", annotations, outcome: buffer.appendCountedData(value, opts) };
  }
  return {
    spec: "@",
    annotations,
    outcome: buffer.appendObject(symbols.objects.handleFor(value), opts),
  };
}

function issueOf(index: number, outcome: AppendOutcome): ArgumentIssue | null {
  switch (outcome.status) {
    case "written":
      return null;
    case "truncated":
      return { index, status: "truncated", bytes: outcome.bytes };
    case "dropped":
      return { index, status: "dropped", reason: outcome.reason };
  }
}

/**
 * Encode every value of `statement` into `buffer` and build the matching format.
 *
 * Values that do not fit are dropped by the encoder; their conversion is
 * replaced by DROPPED_ARGUMENT text so later conversions still line up with
 * their commands.
 */
export function encodeStatement(
  buffer: CommandBuffer,
  statement: LogStatement,
  symbols: TraceSymbols,
): EncodedStatement {
  let format = "";
  let savedErrno = 0;
  const issues: ArgumentIssue[] = [];

  for (let i = 0; i < statement.strings.length; i++) {
    format += escapeLiteral(statement.strings[i] ?? "");
    if (i >= statement.values.length) continue;

    const raw = statement.values[i];
    const privacy: CommandPrivacy = raw instanceof PrivacyArg ? raw.privacy : "auto";
    const value = raw instanceof PrivacyArg ? raw.value : raw;

    if (value === null || value === undefined) {
      format += escapeLiteral(String(value));
      continue;
    }

    let conv: Conversion;
    if (value instanceof ErrnoArg) {
      savedErrno = value.code;
      conv = { spec: "m", annotations: [], outcome: buffer.appendErrno() };
    } else {
      conv = encodeValue(buffer, value, privacy, symbols);
    }
    format += conv.outcome.status === "dropped" ? DROPPED_ARGUMENT : directive(conv);
    const issue = issueOf(i, conv.outcome);
    if (issue) issues.push(issue);
  }

  return { format, savedErrno, issues };
}
