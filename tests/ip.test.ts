/**
 * tcpcraft — IP header writer
 */

import { describe, it, expect } from 'vitest';
import { writeIpHeader, IPPROTO_TCP, IPPROTO_UDP } from '../src/index';

function header(bytes: number): { buf: Uint8Array; dv: DataView } {
  const buf = new Uint8Array(bytes);
  return { buf, dv: new DataView(buf.buffer) };
}

describe('writeIpHeader — IPv4', () => {

  it('writes version, IHL, ECN, total length, TTL and protocol', () => {
    const { buf, dv } = header(40);
    const written = writeIpHeader(dv, 0, { family: 'ipv4', totalBytes: 40, ecn: 'ce', protocol: IPPROTO_TCP });

    expect(written).toBe(20);
    expect(Array.from(buf.subarray(0, 20))).toEqual([
      0x45, 0x03, 0x00, 0x28,
      0x00, 0x00, 0x00, 0x00,
      64,   6,    0x00, 0x00,
      0, 0, 0, 0,
      0, 0, 0, 0,
    ]);
  });

  it('maps ECN tags onto the low two TOS bits', () => {
    const cases = [['none', 0], ['ect1', 1], ['ect0', 2], ['ce', 3], ['ect01', 2], ['nocheck', 0]] as const;
    for (const [ecn, bits] of cases) {
      const { buf, dv } = header(20);
      writeIpHeader(dv, 0, { family: 'ipv4', totalBytes: 20, ecn, protocol: IPPROTO_TCP });
      expect(buf[1]).toBe(bits);
    }
  });
});

describe('writeIpHeader — IPv6', () => {

  it('writes version, traffic class ECN, payload length, next header and hop limit', () => {
    const { buf, dv } = header(60);
    const written = writeIpHeader(dv, 0, { family: 'ipv6', totalBytes: 60, ecn: 'ect1', protocol: IPPROTO_UDP });

    expect(written).toBe(40);
    expect(Array.from(buf.subarray(0, 8))).toEqual([0x60, 0x10, 0x00, 0x00, 0x00, 20, 17, 64]);
    expect(buf.subarray(8, 40).every(b => b === 0)).toBe(true);
  });

  it('places CE in bits 5..4 of the second byte', () => {
    const { buf, dv } = header(40);
    writeIpHeader(dv, 0, { family: 'ipv6', totalBytes: 40, ecn: 'ce', protocol: IPPROTO_TCP });
    expect(buf[0]).toBe(0x60);
    expect(buf[1]).toBe(0x30);
  });
});
