export {
  TraceBlob,
  heapBlobAllocator,
  withTraceBlob,
  type BlobAllocator,
  type BlobAppendOutcome,
  type TraceBlobOpts,
} from "./traceBlob.js";
