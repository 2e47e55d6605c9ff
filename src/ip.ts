/**
 * tcpcraft — IP header writer
 *
 * Lays down the fixed IPv4 or IPv6 header at the start of a datagram.
 * Only the fields the TCP builder controls are populated: version, header
 * length, ECN codepoint, total/payload length and next protocol. Addresses,
 * identification and the IPv4 header checksum stay zero for a later layer.
 *
 * IPv4 (20 bytes):
 *   [0]      version 4 | IHL 5
 *   [1]      DSCP 0 | ECN
 *   [2..3]   total length       u16
 *   [4..5]   identification     u16 = 0
 *   [6..7]   flags | frag off   u16 = 0
 *   [8]      TTL
 *   [9]      protocol
 *   [10..11] header checksum    u16 = 0
 *   [12..19] source, destination = 0
 *
 * IPv6 (40 bytes):
 *   [0..3]   version 6 | traffic class (DSCP 0 | ECN) | flow label 0
 *   [4..5]   payload length     u16 (datagram minus this header)
 *   [6]      next header
 *   [7]      hop limit
 *   [8..39]  source, destination = 0
 */

import {
  IPV4_HEADER_BYTES,
  IPV6_HEADER_BYTES,
  DEFAULT_TTL,
  IP_ECN_NOT_ECT,
  IP_ECN_ECT0,
  IP_ECN_ECT1,
  IP_ECN_CE,
  IP_ECN_MASK,
} from './constants';
import type { AddressFamily, IpEcn } from './types';

export interface IpHeaderParams {
  readonly family:     AddressFamily;
  /** Whole datagram length, IP header included. */
  readonly totalBytes: number;
  readonly ecn:        IpEcn;
  /** IPPROTO_TCP or IPPROTO_UDP. */
  readonly protocol:   number;
}

/** Codepoint placed on the wire for each ECN tag. */
export const IP_ECN_CODEPOINTS: Readonly<Record<IpEcn, number>> = {
  none:    IP_ECN_NOT_ECT,
  ect0:    IP_ECN_ECT0,
  ect1:    IP_ECN_ECT1,
  ce:      IP_ECN_CE,
  ect01:   IP_ECN_ECT0,
  nocheck: IP_ECN_NOT_ECT,
};

/** Write an IP header at `offset`. Returns the number of bytes written. */
export function writeIpHeader(view: DataView, offset: number, params: IpHeaderParams): number {
  const ecnBits = IP_ECN_CODEPOINTS[params.ecn] & IP_ECN_MASK;

  if (params.family === 'ipv4') {
    view.setUint8(offset, 0x40 | (IPV4_HEADER_BYTES >> 2));
    view.setUint8(offset + 1, ecnBits);
    view.setUint16(offset + 2, params.totalBytes);
    view.setUint8(offset + 8, DEFAULT_TTL);
    view.setUint8(offset + 9, params.protocol);
    return IPV4_HEADER_BYTES;
  }

  // Traffic class straddles bytes 0 and 1; ECN sits in its low two bits,
  // which land at bits 5..4 of byte 1.
  view.setUint32(offset, (6 << 28) | (ecnBits << 20));
  view.setUint16(offset + 4, params.totalBytes - IPV6_HEADER_BYTES);
  view.setUint8(offset + 6, params.protocol);
  view.setUint8(offset + 7, DEFAULT_TTL);
  return IPV6_HEADER_BYTES;
}
