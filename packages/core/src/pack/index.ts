export {
  UNKNOWN_CALL_SITE,
  defaultPackAllocator,
  packAndSend,
  packAndSendSignpost,
  type CallSite,
  type PackAllocator,
  type PackContext,
  type PackEvent,
  type PackSendOutcome,
  type PackSkipReason,
  type SignpostEvent,
} from "./assembler.js";

export {
  fillPack,
  fillSignpostPack,
  requiredPackSize,
  requiredSignpostPackSize,
  setPackReturnAddress,
  type PackFields,
  type SignpostPackFields,
} from "./layout.js";
