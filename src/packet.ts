/**
 * tcpcraft — packet assembly
 *
 * A PacketDraft owns one zero-filled buffer of a fixed length and records
 * header views as they are appended in wire order. freeze() hands the
 * finished Packet to the caller; the draft is not used afterwards.
 */

import {
  PACKET_FLAG_UDP_ENCAPSULATED,
  PACKET_FLAG_WIN_NOCHECK,
  PACKET_FLAG_OPTIONS_NOCHECK,
  PACKET_FLAG_IGNORE_TS_VAL,
  PACKET_FLAG_ABSOLUTE_TS_ECR,
  PACKET_FLAG_ABSOLUTE_SEQ,
  PACKET_FLAG_IGNORE_SEQ,
} from './constants';
import type { Direction, HeaderType, HeaderView, IpEcn, Packet } from './types';

// ─── PacketDraft ──────────────────────────────────────────────────────────────

export class PacketDraft {
  readonly buffer: Uint8Array;
  readonly view:   DataView;
  flags = 0;

  private readonly headers: HeaderView[] = [];
  private cursor = 0;

  constructor(
    ipBytes: number,
    readonly direction: Direction,
    readonly ecn:       IpEcn,
  ) {
    this.buffer = new Uint8Array(ipBytes); // zero-filled
    this.view   = new DataView(this.buffer.buffer);
  }

  /**
   * Reserve the next `headerBytes` bytes for a header of `type` that covers
   * `totalBytes` of the datagram. Returns the view's offset.
   */
  appendHeader(type: HeaderType, headerBytes: number, totalBytes: number): number {
    if (this.cursor + headerBytes > this.buffer.length) {
      throw new RangeError(
        `${type} header of ${headerBytes} bytes at offset ${this.cursor} ` +
        `overruns a ${this.buffer.length}-byte packet`,
      );
    }
    const offset = this.cursor;
    this.headers.push({ type, offset, headerBytes, totalBytes });
    this.cursor += headerBytes;
    return offset;
  }

  freeze(): Packet {
    return {
      buffer:    this.buffer,
      headers:   this.headers.slice(),
      direction: this.direction,
      ecn:       this.ecn,
      flags:     this.flags,
      ipBytes:   this.buffer.length,
    };
  }
}

// ─── Queries ──────────────────────────────────────────────────────────────────

export function findHeader(packet: Packet, type: HeaderType): HeaderView | null {
  return packet.headers.find(h => h.type === type) ?? null;
}

const PACKET_FLAG_NAMES: readonly (readonly [number, string])[] = [
  [PACKET_FLAG_UDP_ENCAPSULATED, 'udpEncapsulated'],
  [PACKET_FLAG_WIN_NOCHECK,      'windowNoCheck'],
  [PACKET_FLAG_OPTIONS_NOCHECK,  'optionsNoCheck'],
  [PACKET_FLAG_IGNORE_TS_VAL,    'ignoreTsVal'],
  [PACKET_FLAG_ABSOLUTE_TS_ECR,  'absoluteTsEcr'],
  [PACKET_FLAG_ABSOLUTE_SEQ,     'absoluteSeq'],
  [PACKET_FLAG_IGNORE_SEQ,       'ignoreSeq'],
];

/** Names of the auxiliary flags set in `flags`, in bit order. */
export function describePacketFlags(flags: number): string[] {
  return PACKET_FLAG_NAMES.filter(([bit]) => (flags & bit) !== 0).map(([, name]) => name);
}
