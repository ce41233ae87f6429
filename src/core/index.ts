export {
  calculateDistance,
  calculateScalarDistance,
  compareDistances,
  log2Distance,
} from "./distance";
export { HEX_PREFIX, Key } from "./key";
export { isPeerAddress, PeerNode } from "./peer-node";
export type { Node, PeerAddress } from "./peer-node";
