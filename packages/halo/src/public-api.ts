export type { BaseDatatype, ContiguousDatatype, Datatype } from "./datatypes.js";
export { DatatypeRegistry, datatypeSize, defaultDatatypeRegistry } from "./datatypes.js";
export type {
  Communicator,
  DataArray,
  HaloLayout,
  HaloOptions,
  InsertMode,
  NumericBuffer,
  StarForest,
} from "./halo.js";
export { Halo } from "./halo.js";
