/**
 * tcpcraft — errors
 *
 * Every rejected request produces exactly one TcpPacketError. The builder
 * returns it as a value; only buildTcpPacket() throws it.
 *
 *   grammar    invalid or conflicting flag characters
 *   layout     option padding, TCP header size, datagram size
 *   parameter  a field value that is illegal for this direction
 */

export type TcpPacketErrorKind = 'grammar' | 'layout' | 'parameter';

export class TcpPacketError extends Error {
  readonly kind: TcpPacketErrorKind;

  constructor(kind: TcpPacketErrorKind, message: string) {
    super(message);
    this.name = 'TcpPacketError';
    this.kind = kind;
  }
}

/**
 * Thrown when a computed layout breaks an internal invariant (a header length
 * that is not a multiple of 4). No PacketSpec can cause this.
 */
export class TcpLayoutAssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TcpLayoutAssertionError';
  }
}
