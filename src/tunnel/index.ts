export { FrameReader } from './frame-reader.js';
export { KeyRing, type KeyProposal, type KeyRingOptions } from './key-ring.js';
export {
  TunnelSession,
  DEFAULT_HIGH_WATER_MARK,
  type SessionState,
  type TunnelSessionOptions,
  type RekeyInfo,
} from './session.js';
