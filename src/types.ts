/**
 * tcpcraft — type definitions
 *
 * A PacketSpec is the symbolic request; a Packet is the wire image plus the
 * metadata the injector and verifier read alongside it. The bytes are the
 * truth; the header views are a lens into them.
 */

// ─── Request ──────────────────────────────────────────────────────────────────

export type AddressFamily = 'ipv4' | 'ipv6';

export type Direction = 'inbound' | 'outbound';

/**
 * ECN tag of the IP header.
 *
 * ect01:   either ECT(0) or ECT(1) is acceptable to the verifier.
 *          The wire image carries ECT(0).
 * nocheck: the verifier ignores the ECN field. The wire image carries Not-ECT.
 */
export type IpEcn = 'none' | 'ect0' | 'ect1' | 'ce' | 'ect01' | 'nocheck';

/**
 * Raw TCP option bytes. `length` must be a multiple of 4 and no greater than
 * `data.length`; only the first `length` bytes are copied into the packet.
 */
export interface TcpOptions {
  readonly data:   Uint8Array;
  readonly length: number;
}

export interface PacketSpec {
  readonly family:        AddressFamily;
  readonly direction:     Direction;
  readonly ecn:           IpEcn;
  /** Flag characters, e.g. `"S."`, `"F.E"`, `"P.5"`. */
  readonly flags:         string;
  readonly startSequence: number; // u32
  readonly payloadBytes:  number; // u16
  readonly ackSequence:   number; // u32
  /** u16 window, or -1 when unspecified (outbound only). */
  readonly window:        number;
  /** Absent means "do not compare options". */
  readonly options?:      TcpOptions;

  readonly ignoreTsVal?:  boolean;
  readonly absTsEcr?:     boolean;
  readonly absSeq?:       boolean;
  readonly ignoreSeq?:    boolean;

  /** Either port non-zero wraps the segment in UDP. */
  readonly udpSrcPort?:   number;
  readonly udpDstPort?:   number;
}

// ─── Result ───────────────────────────────────────────────────────────────────

export type HeaderType = AddressFamily | 'udp' | 'tcp';

/**
 * One layer of a packet, addressed inside Packet.buffer.
 *
 * headerBytes covers the header alone; totalBytes covers the header and
 * everything it carries (for IP, the whole datagram).
 */
export interface HeaderView {
  readonly type:        HeaderType;
  readonly offset:      number;
  readonly headerBytes: number;
  readonly totalBytes:  number;
}

export interface Packet {
  /** Exact datagram bytes. Never resized after construction. */
  readonly buffer:    Uint8Array;
  /** Headers in wire order. */
  readonly headers:   readonly HeaderView[];
  readonly direction: Direction;
  readonly ecn:       IpEcn;
  /** PACKET_FLAG_* bits. Not part of the wire image. */
  readonly flags:     number;
  readonly ipBytes:   number;
}

// ─── TCP control bits ─────────────────────────────────────────────────────────

export interface TcpControlBits {
  readonly fin: boolean;
  readonly syn: boolean;
  readonly rst: boolean;
  readonly psh: boolean;
  readonly ack: boolean;
  readonly urg: boolean;
  readonly ece: boolean;
  readonly cwr: boolean;
  readonly ae:  boolean;
}
