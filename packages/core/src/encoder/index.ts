/**
 * packages/core/src/encoder/index.ts — Command stream encoder public API.
 */

export {
  CommandBuffer,
  MAX_SCALAR_BYTES,
  createCommandBuffer,
  privacyFlags,
  type CommandBufferOpts,
} from "./commandBuffer.js";

export type {
  AppendOpts,
  AppendOutcome,
  Command,
  CommandBufferState,
  CommandHeader,
  CommandKind,
  CommandPrivacy,
  DropReason,
} from "./types.js";
