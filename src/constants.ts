/**
 * tcpcraft — layout constants
 *
 * These constants define the wire contract of every packet built here.
 * All multi-byte fields are big-endian (network byte order).
 *
 * A built datagram is laid out as:
 *
 *   [IP header]   20 bytes (IPv4) or 40 bytes (IPv6), no IP options
 *   [UDP header]   8 bytes, only when the segment is UDP-encapsulated
 *   [TCP header]  20 fixed bytes + options (multiple of 4, ≤ 60 in total)
 *   [payload]     zero-filled
 *
 * The TCP header (RFC 9293 + RFC 9768 AE bit):
 *
 *   [0..1]    source port        u16  = 0 (filled in by a later layer)
 *   [2..3]    destination port   u16  = 0 (filled in by a later layer)
 *   [4..7]    sequence number    u32
 *   [8..11]   ack number         u32
 *   [12]      data offset (hi nibble, 32-bit words) | reserved | AE (bit 0)
 *   [13]      CWR ECE URG ACK PSH RST SYN FIN
 *   [14..15]  window             u16
 *   [16..17]  checksum           u16  = 0 (computed elsewhere)
 *   [18..19]  urgent pointer     u16  = 0
 *   [20..]    options
 */

// ─── Header sizes ─────────────────────────────────────────────────────────────

export const IPV4_HEADER_BYTES = 20;
export const IPV6_HEADER_BYTES = 40;
export const UDP_HEADER_BYTES  = 8;
export const TCP_HEADER_BYTES  = 20; // fixed fields only, no options

/** Data offset is a 4-bit count of 32-bit words: 15 × 4. */
export const MAX_TCP_HEADER_BYTES   = 60;

/**
 * Largest datagram the builder will allocate. A datagram of exactly this size
 * does not fit the 16-bit IP length field: IPv4 total length is written as
 * 0x0000 (the value wraps, as htons would).
 */
export const MAX_TCP_DATAGRAM_BYTES = 64 * 1024;

// ─── IP ───────────────────────────────────────────────────────────────────────

export const IPPROTO_TCP = 6;
export const IPPROTO_UDP = 17;

export const DEFAULT_TTL = 64;

/** IP ECN field values (low two bits of TOS / traffic class). */
export const IP_ECN_NOT_ECT = 0b00;
export const IP_ECN_ECT1    = 0b01;
export const IP_ECN_ECT0    = 0b10;
export const IP_ECN_CE      = 0b11;
export const IP_ECN_MASK    = 0b11;

// ─── UDP field offsets ────────────────────────────────────────────────────────

export const UDP_OFFSET_SRC_PORT = 0; // u16
export const UDP_OFFSET_DST_PORT = 2; // u16
export const UDP_OFFSET_LENGTH   = 4; // u16 — UDP header + data
export const UDP_OFFSET_CHECKSUM = 6; // u16 — left at 0

// ─── TCP field offsets ────────────────────────────────────────────────────────

export const TCP_OFFSET_SRC_PORT    =  0; // u16
export const TCP_OFFSET_DST_PORT    =  2; // u16
export const TCP_OFFSET_SEQ         =  4; // u32
export const TCP_OFFSET_ACK         =  8; // u32
export const TCP_OFFSET_DATA_OFFSET = 12; // u8 — doff << 4 | AE
export const TCP_OFFSET_FLAGS       = 13; // u8
export const TCP_OFFSET_WINDOW      = 14; // u16
export const TCP_OFFSET_CHECKSUM    = 16; // u16
export const TCP_OFFSET_URG_PTR     = 18; // u16
export const TCP_OFFSET_OPTIONS     = TCP_HEADER_BYTES;

// ─── TCP control bits ─────────────────────────────────────────────────────────

/** Byte 13. */
export const TCP_FLAG_FIN = 0x01;
export const TCP_FLAG_SYN = 0x02;
export const TCP_FLAG_RST = 0x04;
export const TCP_FLAG_PSH = 0x08;
export const TCP_FLAG_ACK = 0x10;
export const TCP_FLAG_URG = 0x20;
export const TCP_FLAG_ECE = 0x40;
export const TCP_FLAG_CWR = 0x80;

/** Byte 12, low bit (formerly NS). */
export const TCP_FLAG_AE  = 0x01;

// ─── Auxiliary packet flags ───────────────────────────────────────────────────

/**
 * Out-of-band bits carried on Packet.flags. None of these touch the wire
 * image; they tell the capture verifier which fields to skip or compare
 * without sequence-number remapping.
 */
export const PACKET_FLAG_UDP_ENCAPSULATED = 0x0001;
export const PACKET_FLAG_WIN_NOCHECK      = 0x0002; // window not compared
export const PACKET_FLAG_OPTIONS_NOCHECK  = 0x0004; // TCP options not compared
export const PACKET_FLAG_IGNORE_TS_VAL    = 0x0008;
export const PACKET_FLAG_ABSOLUTE_TS_ECR  = 0x0010;
export const PACKET_FLAG_ABSOLUTE_SEQ     = 0x0020;
export const PACKET_FLAG_IGNORE_SEQ       = 0x0040;
