/**
 * tcpcraft — TCP packet builder
 *
 * newTcpPacket() turns a PacketSpec into a wire image in three stages:
 *
 *   1. validate   — flag grammar (validateTcpFlags)
 *   2. plan       — header sizes and offsets (planTcpPacket)
 *   3. write      — allocate once, then IP → [UDP] → TCP in wire order
 *
 * Every rejection is decided before the buffer is allocated, including the
 * inbound-window check, so a failed call holds nothing. Checksums are left
 * at zero; so are the TCP ports, which a later layer fills in from the
 * socket under test.
 */

import {
  IPPROTO_TCP,
  IPPROTO_UDP,
  UDP_OFFSET_SRC_PORT,
  UDP_OFFSET_DST_PORT,
  UDP_OFFSET_LENGTH,
  UDP_OFFSET_CHECKSUM,
  TCP_OFFSET_SRC_PORT,
  TCP_OFFSET_DST_PORT,
  TCP_OFFSET_SEQ,
  TCP_OFFSET_ACK,
  TCP_OFFSET_DATA_OFFSET,
  TCP_OFFSET_FLAGS,
  TCP_OFFSET_WINDOW,
  TCP_OFFSET_CHECKSUM,
  TCP_OFFSET_URG_PTR,
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
import { TcpPacketError } from './errors';
import { validateTcpFlags, tcpControlBits, formatTcpFlags } from './flags';
import { writeIpHeader } from './ip';
import { logger } from './logger';
import { PacketDraft, findHeader } from './packet';
import { planTcpPacket, type TcpPacketPlan } from './plan';
import type { Packet, PacketSpec, TcpControlBits } from './types';

const log = logger.createLogger('tcp');

// ─── Public types ─────────────────────────────────────────────────────────────

export type TcpPacketResult =
  | { readonly ok: true;  readonly packet: Packet }
  | { readonly ok: false; readonly error:  TcpPacketError };

/** Decoded TCP header; `options` is a copy, not a view into the packet. */
export interface TcpHeaderFields {
  readonly srcPort:     number;
  readonly dstPort:     number;
  readonly seq:         number;
  readonly ack:         number;
  readonly dataOffset:  number; // 32-bit words
  readonly flags:       TcpControlBits;
  readonly window:      number;
  readonly checksum:    number;
  readonly urgentPtr:   number;
  readonly options:     Uint8Array;
}

export interface UdpHeaderFields {
  readonly srcPort:  number;
  readonly dstPort:  number;
  readonly length:   number;
  readonly checksum: number;
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

function reject(error: TcpPacketError): TcpPacketResult {
  log.debug(`rejected: ${error.message}`, { kind: error.kind });
  return { ok: false, error };
}

function checkU16(name: string, value: number): TcpPacketError | null {
  if (Number.isInteger(value) && value >= 0 && value <= 0xffff) return null;
  return new TcpPacketError('parameter', `${name} ${value} is out of range 0..65535`);
}

function controlByte(bits: TcpControlBits): number {
  return (bits.fin ? TCP_FLAG_FIN : 0)
       | (bits.syn ? TCP_FLAG_SYN : 0)
       | (bits.rst ? TCP_FLAG_RST : 0)
       | (bits.psh ? TCP_FLAG_PSH : 0)
       | (bits.ack ? TCP_FLAG_ACK : 0)
       | (bits.urg ? TCP_FLAG_URG : 0)
       | (bits.ece ? TCP_FLAG_ECE : 0)
       | (bits.cwr ? TCP_FLAG_CWR : 0);
}

function writeUdpHeader(draft: PacketDraft, plan: TcpPacketPlan, srcPort: number, dstPort: number): void {
  const udpBytes = plan.udpHeaderBytes + plan.tcpHeaderBytes + plan.payloadBytes;
  const off      = draft.appendHeader('udp', plan.udpHeaderBytes, udpBytes);
  const dv       = draft.view;

  dv.setUint16(off + UDP_OFFSET_SRC_PORT, srcPort);
  dv.setUint16(off + UDP_OFFSET_DST_PORT, dstPort);
  dv.setUint16(off + UDP_OFFSET_LENGTH,   udpBytes);
  dv.setUint16(off + UDP_OFFSET_CHECKSUM, 0);
}

function writeTcpHeader(draft: PacketDraft, plan: TcpPacketPlan, spec: PacketSpec): void {
  const off = draft.appendHeader('tcp', plan.tcpHeaderBytes, plan.tcpHeaderBytes + plan.payloadBytes);
  const dv  = draft.view;
  const bits = tcpControlBits(spec.flags);

  dv.setUint16(off + TCP_OFFSET_SRC_PORT, 0);
  dv.setUint16(off + TCP_OFFSET_DST_PORT, 0);
  dv.setUint32(off + TCP_OFFSET_SEQ, spec.startSequence);
  dv.setUint32(off + TCP_OFFSET_ACK, spec.ackSequence);
  dv.setUint8(off + TCP_OFFSET_DATA_OFFSET, ((plan.tcpHeaderBytes / 4) << 4) | (bits.ae ? TCP_FLAG_AE : 0));
  dv.setUint8(off + TCP_OFFSET_FLAGS, controlByte(bits));

  if (spec.window === -1) {
    dv.setUint16(off + TCP_OFFSET_WINDOW, 0);
    draft.flags |= PACKET_FLAG_WIN_NOCHECK;
  } else {
    dv.setUint16(off + TCP_OFFSET_WINDOW, spec.window);
  }

  dv.setUint16(off + TCP_OFFSET_CHECKSUM, 0);
  dv.setUint16(off + TCP_OFFSET_URG_PTR, 0);

  if (spec.options === undefined) {
    draft.flags |= PACKET_FLAG_OPTIONS_NOCHECK;
  } else if (spec.options.length > 0) {
    // Copy-in: the packet never aliases caller memory.
    draft.buffer.set(spec.options.data.subarray(0, spec.options.length), plan.optionsOffset);
  }
}

// ─── newTcpPacket ─────────────────────────────────────────────────────────────

/**
 * Build a TCP segment (optionally UDP-encapsulated) from a symbolic spec.
 *
 * Returns `{ ok: false, error }` for a rejected request: invalid or
 * conflicting flags, unpadded or oversized options, an oversized datagram,
 * a payload length, option length or UDP port that is not an integer in
 * range, or an unspecified window on an inbound packet. Identical specs always
 * produce byte-identical buffers.
 */
export function newTcpPacket(spec: PacketSpec): TcpPacketResult {
  const flagError = validateTcpFlags(spec.flags);
  if (flagError !== null) return reject(flagError);

  const options = spec.options;
  if (
    options !== undefined &&
    (!Number.isInteger(options.length) || options.length < 0 || options.length > options.data.length)
  ) {
    return reject(new TcpPacketError(
      'parameter',
      `TCP options length ${options.length} is out of range for ${options.data.length} data bytes`,
    ));
  }

  const srcPort = spec.udpSrcPort ?? 0;
  const dstPort = spec.udpDstPort ?? 0;

  const rangeError =
    checkU16('TCP payload length', spec.payloadBytes) ??
    checkU16('UDP source port', srcPort) ??
    checkU16('UDP destination port', dstPort);
  if (rangeError !== null) return reject(rangeError);

  const encapsulate = srcPort > 0 || dstPort > 0;

  const plan = planTcpPacket({
    family:       spec.family,
    optionBytes:  options?.length ?? 0,
    payloadBytes: spec.payloadBytes,
    encapsulate,
  });
  if (plan instanceof TcpPacketError) return reject(plan);

  if (spec.window === -1 && spec.direction === 'inbound') {
    return reject(new TcpPacketError('parameter', 'window must be specified for inbound packets'));
  }

  // ── Write ────────────────────────────────────────────────────────────────

  const draft = new PacketDraft(plan.ipBytes, spec.direction, spec.ecn);
  if (encapsulate) draft.flags |= PACKET_FLAG_UDP_ENCAPSULATED;

  const ipOff = draft.appendHeader(spec.family, plan.ipHeaderBytes, plan.ipBytes);
  writeIpHeader(draft.view, ipOff, {
    family:     spec.family,
    totalBytes: plan.ipBytes,
    ecn:        spec.ecn,
    protocol:   encapsulate ? IPPROTO_UDP : IPPROTO_TCP,
  });

  if (encapsulate) writeUdpHeader(draft, plan, srcPort, dstPort);
  writeTcpHeader(draft, plan, spec);

  if (spec.ignoreTsVal) draft.flags |= PACKET_FLAG_IGNORE_TS_VAL;
  if (spec.absTsEcr)    draft.flags |= PACKET_FLAG_ABSOLUTE_TS_ECR;
  if (spec.absSeq)      draft.flags |= PACKET_FLAG_ABSOLUTE_SEQ;
  if (spec.ignoreSeq)   draft.flags |= PACKET_FLAG_IGNORE_SEQ;

  const packet = draft.freeze();
  log.debug(`built ${spec.family} packet`, {
    bytes: packet.ipBytes,
    flags: formatTcpFlags(tcpControlBits(spec.flags)),
    encapsulated: encapsulate,
  });
  return { ok: true, packet };
}

/** newTcpPacket() that throws the TcpPacketError instead of returning it. */
export function buildTcpPacket(spec: PacketSpec): Packet {
  const result = newTcpPacket(spec);
  if (!result.ok) throw result.error;
  return result.packet;
}

// ─── Readers ──────────────────────────────────────────────────────────────────

/** Decode the TCP header of a built packet. */
export function readTcpHeader(packet: Packet): TcpHeaderFields {
  const tcp = findHeader(packet, 'tcp');
  if (tcp === null) throw new RangeError('packet has no TCP header');

  const { buffer } = packet;
  const dv  = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const off = tcp.offset;

  const doffByte = dv.getUint8(off + TCP_OFFSET_DATA_OFFSET);
  const ctrl     = dv.getUint8(off + TCP_OFFSET_FLAGS);
  const dataOffset = doffByte >> 4;

  return {
    srcPort:    dv.getUint16(off + TCP_OFFSET_SRC_PORT),
    dstPort:    dv.getUint16(off + TCP_OFFSET_DST_PORT),
    seq:        dv.getUint32(off + TCP_OFFSET_SEQ),
    ack:        dv.getUint32(off + TCP_OFFSET_ACK),
    dataOffset,
    flags: {
      fin: (ctrl & TCP_FLAG_FIN) !== 0,
      syn: (ctrl & TCP_FLAG_SYN) !== 0,
      rst: (ctrl & TCP_FLAG_RST) !== 0,
      psh: (ctrl & TCP_FLAG_PSH) !== 0,
      ack: (ctrl & TCP_FLAG_ACK) !== 0,
      urg: (ctrl & TCP_FLAG_URG) !== 0,
      ece: (ctrl & TCP_FLAG_ECE) !== 0,
      cwr: (ctrl & TCP_FLAG_CWR) !== 0,
      ae:  (doffByte & TCP_FLAG_AE) !== 0,
    },
    window:    dv.getUint16(off + TCP_OFFSET_WINDOW),
    checksum:  dv.getUint16(off + TCP_OFFSET_CHECKSUM),
    urgentPtr: dv.getUint16(off + TCP_OFFSET_URG_PTR),
    options:   buffer.slice(off + TCP_OFFSET_OPTIONS, off + dataOffset * 4),
  };
}

/** Decode the UDP header of an encapsulated packet; null when there is none. */
export function readUdpHeader(packet: Packet): UdpHeaderFields | null {
  const udp = findHeader(packet, 'udp');
  if (udp === null) return null;

  const { buffer } = packet;
  const dv  = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const off = udp.offset;

  return {
    srcPort:  dv.getUint16(off + UDP_OFFSET_SRC_PORT),
    dstPort:  dv.getUint16(off + UDP_OFFSET_DST_PORT),
    length:   dv.getUint16(off + UDP_OFFSET_LENGTH),
    checksum: dv.getUint16(off + UDP_OFFSET_CHECKSUM),
  };
}
