/**
 * tcpcraft — length planning
 */

import { describe, it, expect } from 'vitest';
import {
  planTcpPacket,
  ipHeaderMinBytes,
  TcpPacketError,
  MAX_TCP_DATAGRAM_BYTES,
} from '../src/index';
import type { TcpPacketPlan, TcpPacketPlanInput } from '../src/index';

function plan(input: Partial<TcpPacketPlanInput> = {}): TcpPacketPlan | TcpPacketError {
  return planTcpPacket({
    family:       'ipv4',
    optionBytes:  0,
    payloadBytes: 0,
    encapsulate:  false,
    ...input,
  });
}

function errorOf(result: TcpPacketPlan | TcpPacketError): TcpPacketError {
  if (!(result instanceof TcpPacketError)) throw new Error('expected a TcpPacketError');
  return result;
}

describe('ipHeaderMinBytes', () => {
  it('is 20 for IPv4 and 40 for IPv6', () => {
    expect(ipHeaderMinBytes('ipv4')).toBe(20);
    expect(ipHeaderMinBytes('ipv6')).toBe(40);
  });
});

describe('planTcpPacket — geometry', () => {

  it('bare IPv4 segment is 40 bytes with TCP at offset 20', () => {
    expect(plan()).toEqual({
      family:         'ipv4',
      encapsulate:    false,
      ipHeaderBytes:  20,
      udpHeaderBytes: 0,
      tcpHeaderBytes: 20,
      optionBytes:    0,
      payloadBytes:   0,
      ipBytes:        40,
      udpOffset:      null,
      tcpOffset:      20,
      optionsOffset:  40,
      payloadOffset:  40,
    });
  });

  it('encapsulated IPv6 segment with options and payload', () => {
    expect(plan({ family: 'ipv6', optionBytes: 12, payloadBytes: 100, encapsulate: true })).toEqual({
      family:         'ipv6',
      encapsulate:    true,
      ipHeaderBytes:  40,
      udpHeaderBytes: 8,
      tcpHeaderBytes: 32,
      optionBytes:    12,
      payloadBytes:   100,
      ipBytes:        180,
      udpOffset:      40,
      tcpOffset:      48,
      optionsOffset:  68,
      payloadOffset:  80,
    });
  });
});

describe('planTcpPacket — rejections', () => {

  it('reports option padding excess as length & 3', () => {
    for (const optionBytes of [1, 2, 3, 5, 6, 7, 13]) {
      const err = errorOf(plan({ optionBytes }));
      expect(err.kind).toBe('layout');
      expect(err.message).toBe(
        'TCP options are not padded correctly to ensure TCP header is a multiple of 4 bytes: ' +
        `${optionBytes & 3} excess bytes`,
      );
    }
  });

  it('accepts 40 option bytes (60-byte header) and rejects 44', () => {
    const ok = plan({ optionBytes: 40 });
    expect(ok).not.toBeInstanceOf(TcpPacketError);
    expect(errorOf(plan({ optionBytes: 44 })).message).toBe('TCP header too large');
  });

  it('checks padding before header size', () => {
    expect(errorOf(plan({ optionBytes: 43 })).message).toMatch(/: 3 excess bytes$/);
  });

  it('rejects a datagram one byte over the maximum', () => {
    const fits = MAX_TCP_DATAGRAM_BYTES - 40;
    expect(plan({ payloadBytes: fits })).not.toBeInstanceOf(TcpPacketError);
    expect(errorOf(plan({ payloadBytes: fits + 1 })).message).toBe('TCP segment too large');
  });

  it('counts the UDP header toward the datagram size', () => {
    const fits = MAX_TCP_DATAGRAM_BYTES - 40;
    expect(errorOf(plan({ payloadBytes: fits, encapsulate: true })).message).toBe('TCP segment too large');
  });
});
