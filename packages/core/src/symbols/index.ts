import { ObjectHandleTable } from "./objectHandles.js";
import { ReferenceTable, type ReferenceTableOpts } from "./referenceTable.js";

export {
  ObjectHandleTable,
  describeObject,
  type CollectionWatcher,
  type ObjectHandleTableOpts,
} from "./objectHandles.js";
export { DEFAULT_MAX_REFERENCES, ReferenceTable, type ReferenceTableOpts } from "./referenceTable.js";

/**
 * Symbol tables shared by an emitter and the backend that decodes its packs.
 */
export type TraceSymbols = Readonly<{
  strings: ReferenceTable;
  objects: ObjectHandleTable;
}>;

export function createTraceSymbols(opts: ReferenceTableOpts = {}): TraceSymbols {
  return Object.freeze({
    strings: new ReferenceTable(opts),
    objects: new ObjectHandleTable(),
  });
}

/** Process-wide tables used when an emitter or backend is not given its own. */
export const defaultTraceSymbols: TraceSymbols = createTraceSymbols();
