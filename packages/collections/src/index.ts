// Typeclasses
export type { Eq, Hash, Ord, Ordering, Show, Keyed } from "./typeclasses.js";
export {
  makeEq,
  eqStrict,
  eqBy,
  eqString,
  eqNumber,
  hashString,
  hashNumber,
  hashBy,
  combineHashes,
  ordString,
  ordNumber,
  ordBy,
  showString,
  showNumber,
  showBy,
  keyed,
  keyedBy,
  stringKey,
  numberKey,
  optional,
} from "./typeclasses.js";

// Data structures
export { HashSet } from "./hash-set.js";
export { HashMap } from "./hash-map.js";
