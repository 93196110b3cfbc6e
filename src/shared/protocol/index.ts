export {
  PROTOCOL_VERSION,
  HEADER_LENGTH,
  DEFAULT_MAX_FRAME_SIZE,
  bodyLength,
  encodeHeader,
  parseHeader,
  pack,
  unpack,
  type PacketHeader,
  type UnpackedPacket,
  type HeaderCheck,
} from './packet.js';

export {
  KEY_ID_LENGTH,
  RECORD_TYPES,
  encodeRecord,
  decodeRecord,
  type TunnelRecord,
  type ProbeRecord,
  type DataRecord,
  type EndRecord,
  type RekeyRecord,
  type RekeyAckRecord,
  type RekeyDoneRecord,
} from './records.js';
