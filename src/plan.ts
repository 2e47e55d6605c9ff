/**
 * tcpcraft — length planning
 *
 * Every size and offset of a packet is decided here, before any buffer
 * exists. A plan that comes back from planTcpPacket() always fits: the
 * writer allocates exactly plan.ipBytes and never checks a length again.
 *
 * Check order (first failure wins):
 *   1. option bytes must be a multiple of 4
 *   2. every header length is a multiple of 4 (internal assertion)
 *   3. TCP header ≤ MAX_TCP_HEADER_BYTES
 *   4. whole datagram ≤ MAX_TCP_DATAGRAM_BYTES
 */

import {
  IPV4_HEADER_BYTES,
  IPV6_HEADER_BYTES,
  UDP_HEADER_BYTES,
  TCP_HEADER_BYTES,
  TCP_OFFSET_OPTIONS,
  MAX_TCP_HEADER_BYTES,
  MAX_TCP_DATAGRAM_BYTES,
} from './constants';
import { TcpPacketError, TcpLayoutAssertionError } from './errors';
import type { AddressFamily } from './types';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TcpPacketPlanInput {
  readonly family:       AddressFamily;
  readonly optionBytes:  number;
  readonly payloadBytes: number;
  readonly encapsulate:  boolean;
}

/**
 * Byte geometry of one packet. Offsets are absolute within the buffer.
 * udpHeaderBytes is 0 and udpOffset is null when not encapsulating.
 */
export interface TcpPacketPlan {
  readonly family:         AddressFamily;
  readonly encapsulate:    boolean;
  readonly ipHeaderBytes:  number;
  readonly udpHeaderBytes: number;
  readonly tcpHeaderBytes: number;
  readonly optionBytes:    number;
  readonly payloadBytes:   number;
  readonly ipBytes:        number;
  readonly udpOffset:      number | null;
  readonly tcpOffset:      number;
  readonly optionsOffset:  number;
  readonly payloadOffset:  number;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Minimum (option-less) IP header length for an address family. */
export function ipHeaderMinBytes(family: AddressFamily): number {
  return family === 'ipv4' ? IPV4_HEADER_BYTES : IPV6_HEADER_BYTES;
}

function assertWordAligned(name: string, bytes: number): void {
  if ((bytes & 0x3) !== 0) {
    throw new TcpLayoutAssertionError(`${name} length ${bytes} is not a multiple of 4`);
  }
}

// ─── planTcpPacket ────────────────────────────────────────────────────────────

/**
 * Compute header and datagram sizes, or return the layout error that rules
 * the request out. Pure; allocates nothing but the result.
 */
export function planTcpPacket(input: TcpPacketPlanInput): TcpPacketPlan | TcpPacketError {
  const { family, optionBytes, payloadBytes, encapsulate } = input;

  const ipHeaderBytes  = ipHeaderMinBytes(family); // IP options are not modeled
  const udpHeaderBytes = encapsulate ? UDP_HEADER_BYTES : 0;
  const tcpHeaderBytes = TCP_HEADER_BYTES + optionBytes;

  if ((optionBytes & 0x3) !== 0) {
    return new TcpPacketError(
      'layout',
      'TCP options are not padded correctly ' +
      'to ensure TCP header is a multiple of 4 bytes: ' +
      `${optionBytes & 0x3} excess bytes`,
    );
  }

  assertWordAligned('TCP header', tcpHeaderBytes);
  assertWordAligned('IP header', ipHeaderBytes);

  if (tcpHeaderBytes > MAX_TCP_HEADER_BYTES) {
    return new TcpPacketError('layout', 'TCP header too large');
  }

  const ipBytes = ipHeaderBytes + udpHeaderBytes + tcpHeaderBytes + payloadBytes;
  if (ipBytes > MAX_TCP_DATAGRAM_BYTES) {
    return new TcpPacketError('layout', 'TCP segment too large');
  }

  const tcpOffset = ipHeaderBytes + udpHeaderBytes;

  return {
    family,
    encapsulate,
    ipHeaderBytes,
    udpHeaderBytes,
    tcpHeaderBytes,
    optionBytes,
    payloadBytes,
    ipBytes,
    udpOffset:     encapsulate ? ipHeaderBytes : null,
    tcpOffset,
    optionsOffset: tcpOffset + TCP_OFFSET_OPTIONS,
    payloadOffset: tcpOffset + tcpHeaderBytes,
  };
}
