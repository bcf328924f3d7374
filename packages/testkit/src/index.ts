export { assertBytesEqual, hexdump } from "./golden.js";
export {
  createRecordingBackend,
  type RecordedEvent,
  type RecordingBackend,
  type RecordingBackendOpts,
} from "./recordingBackend.js";
export { assert, describe, test } from "./nodeTest.js";
