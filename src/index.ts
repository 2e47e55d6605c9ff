// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  AddressFamily,
  Direction,
  IpEcn,
  TcpOptions,
  PacketSpec,
  HeaderType,
  HeaderView,
  Packet,
  TcpControlBits,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  IPV4_HEADER_BYTES,
  IPV6_HEADER_BYTES,
  UDP_HEADER_BYTES,
  TCP_HEADER_BYTES,
  MAX_TCP_HEADER_BYTES,
  MAX_TCP_DATAGRAM_BYTES,
  IPPROTO_TCP,
  IPPROTO_UDP,
  DEFAULT_TTL,
  IP_ECN_NOT_ECT,
  IP_ECN_ECT1,
  IP_ECN_ECT0,
  IP_ECN_CE,
  TCP_OFFSET_OPTIONS,
  TCP_FLAG_FIN,
  TCP_FLAG_SYN,
  TCP_FLAG_RST,
  TCP_FLAG_PSH,
  TCP_FLAG_ACK,
  TCP_FLAG_URG,
  TCP_FLAG_ECE,
  TCP_FLAG_CWR,
  TCP_FLAG_AE,
  PACKET_FLAG_UDP_ENCAPSULATED,
  PACKET_FLAG_WIN_NOCHECK,
  PACKET_FLAG_OPTIONS_NOCHECK,
  PACKET_FLAG_IGNORE_TS_VAL,
  PACKET_FLAG_ABSOLUTE_TS_ECR,
  PACKET_FLAG_ABSOLUTE_SEQ,
  PACKET_FLAG_IGNORE_SEQ,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export { TcpPacketError, TcpLayoutAssertionError } from './errors';
export type { TcpPacketErrorKind } from './errors';

// ─── Flags ────────────────────────────────────────────────────────────────────
export {
  VALID_TCP_FLAGS,
  validateTcpFlags,
  aceCodepoint,
  tcpControlBits,
  formatTcpFlags,
} from './flags';

// ─── Plan ─────────────────────────────────────────────────────────────────────
export { planTcpPacket, ipHeaderMinBytes } from './plan';
export type { TcpPacketPlan, TcpPacketPlanInput } from './plan';

// ─── IP ───────────────────────────────────────────────────────────────────────
export { writeIpHeader, IP_ECN_CODEPOINTS } from './ip';
export type { IpHeaderParams } from './ip';

// ─── Packet ───────────────────────────────────────────────────────────────────
export { PacketDraft, findHeader, describePacketFlags } from './packet';

// ─── TCP ──────────────────────────────────────────────────────────────────────
export { newTcpPacket, buildTcpPacket, readTcpHeader, readUdpHeader } from './tcp';
export type { TcpPacketResult, TcpHeaderFields, UdpHeaderFields } from './tcp';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { Logger, logger } from './logger';
export type { LogLevel, LogContext, LoggerInstance } from './logger';
