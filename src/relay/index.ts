export { relaySession, createRelayHandler, type RelayOptions, type SessionHandler } from './relay.js';
export { pumpSocket } from './pump.js';
export { SessionReader } from './session-reader.js';
export {
  SOCKS_VERSION,
  AUTH_METHODS,
  COMMANDS,
  ADDRESS_TYPES,
  REPLY_CODES,
  encodeGreeting,
  encodeMethodChoice,
  encodeRequest,
  encodeReply,
  encodeAddress,
  ipv6ToBytes,
  bytesToIpv6,
  formatTarget,
  replyCodeFor,
  type AddressType,
  type SocksTarget,
  type BoundAddress,
} from './socks5.js';
