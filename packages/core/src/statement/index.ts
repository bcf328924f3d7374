export {
  DROPPED_ARGUMENT,
  ErrnoArg,
  FLOAT_PRECISION,
  PrivacyArg,
  encodeStatement,
  errno,
  literal,
  privateValue,
  publicValue,
  trace,
  type ArgumentIssue,
  type EncodedStatement,
  type LogStatement,
  type TraceArg,
  type TracePlainValue,
} from "./statement.js";
