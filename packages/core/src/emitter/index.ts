export { createTraceLog } from "./traceLog.js";
export type {
  CallSiteResolver,
  TraceAuditEvent,
  TraceAuditObserver,
  TraceEntryPoint,
  TraceLog,
  TraceLogOpts,
  TraceStatement,
} from "./types.js";
