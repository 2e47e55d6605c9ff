/**
 * tcpcraft — flag grammar
 *
 * Alphabet checks, the ECN-letter / ACE-numeral exclusivity scan, control-bit
 * derivation and the letter rendering used in log lines.
 */

import { describe, it, expect } from 'vitest';
import {
  validateTcpFlags,
  aceCodepoint,
  tcpControlBits,
  formatTcpFlags,
  TcpPacketError,
} from '../src/index';

// ─── validateTcpFlags ─────────────────────────────────────────────────────────

describe('validateTcpFlags', () => {

  it('accepts every legal character on its own', () => {
    for (const c of '.FSRPEWA01234567') {
      expect(validateTcpFlags(c)).toBeNull();
    }
  });

  it('accepts an empty string and common combinations', () => {
    expect(validateTcpFlags('')).toBeNull();
    expect(validateTcpFlags('S.')).toBeNull();
    expect(validateTcpFlags('F.EWA')).toBeNull();
    expect(validateTcpFlags('P.5')).toBeNull();
    expect(validateTcpFlags('EE')).toBeNull();
  });

  it('rejects a character outside the alphabet and names it', () => {
    const err = validateTcpFlags('S.U');
    expect(err).toBeInstanceOf(TcpPacketError);
    expect(err?.kind).toBe('grammar');
    expect(err?.message).toBe("Invalid TCP flag: 'U'");
  });

  it('rejects 8 and 9, which are not ACE numerals', () => {
    expect(validateTcpFlags('8')?.message).toBe("Invalid TCP flag: '8'");
    expect(validateTcpFlags('.9')?.message).toBe("Invalid TCP flag: '9'");
  });

  it('rejects a numeral after an ECN letter, reporting the numeral', () => {
    const err = validateTcpFlags('EW5');
    expect(err?.kind).toBe('grammar');
    expect(err?.message).toBe("Conflicting TCP flag: '5'");
  });

  it('rejects an ECN letter after a numeral, reporting the letter', () => {
    expect(validateTcpFlags('.3A')?.message).toBe("Conflicting TCP flag: 'A'");
  });

  it('rejects a second numeral', () => {
    expect(validateTcpFlags('S12')?.message).toBe("Conflicting TCP flag: '2'");
    expect(validateTcpFlags('00')?.message).toBe("Conflicting TCP flag: '0'");
  });

  it('reports whichever problem the scan meets first', () => {
    expect(validateTcpFlags('3EX')?.message).toBe("Conflicting TCP flag: 'E'");
    expect(validateTcpFlags('X3E')?.message).toBe("Invalid TCP flag: 'X'");
  });
});

// ─── aceCodepoint ─────────────────────────────────────────────────────────────

describe('aceCodepoint', () => {
  it('returns the numeral value, or null without one', () => {
    expect(aceCodepoint('S.6')).toBe(6);
    expect(aceCodepoint('0')).toBe(0);
    expect(aceCodepoint('S.EW')).toBeNull();
  });
});

// ─── tcpControlBits ───────────────────────────────────────────────────────────

describe('tcpControlBits', () => {

  it('maps F S R P . to their bits', () => {
    const bits = tcpControlBits('FSRP.');
    expect(bits).toEqual({
      fin: true, syn: true, rst: true, psh: true, ack: true,
      urg: false, ece: false, cwr: false, ae: false,
    });
  });

  it('maps E W A to ECE CWR AE', () => {
    expect(tcpControlBits('E')).toMatchObject({ ece: true,  cwr: false, ae: false });
    expect(tcpControlBits('W')).toMatchObject({ ece: false, cwr: true,  ae: false });
    expect(tcpControlBits('A')).toMatchObject({ ece: false, cwr: false, ae: true  });
  });

  it('expands every ACE numeral into ECE (bit0), CWR (bit1), AE (bit2)', () => {
    for (let n = 0; n <= 7; n++) {
      const bits = tcpControlBits(`.${n}`);
      expect(bits.ece).toBe((n & 1) !== 0);
      expect(bits.cwr).toBe((n & 2) !== 0);
      expect(bits.ae).toBe((n & 4) !== 0);
      expect(bits.ack).toBe(true);
    }
  });

  it('treats numeral 0 the same as no ECN flags at all', () => {
    expect(tcpControlBits('S.0')).toEqual(tcpControlBits('S.'));
  });

  it('numeral 3 sets ECE and CWR but not AE', () => {
    expect(tcpControlBits('3')).toMatchObject({ ece: true, cwr: true, ae: false });
  });
});

// ─── formatTcpFlags ───────────────────────────────────────────────────────────

describe('formatTcpFlags', () => {
  it('renders in F S R P . E W A order regardless of input order', () => {
    expect(formatTcpFlags(tcpControlBits('.SF'))).toBe('FS.');
    expect(formatTcpFlags(tcpControlBits('AP.E'))).toBe('P.EA');
  });

  it('renders an ACE numeral as letters', () => {
    expect(formatTcpFlags(tcpControlBits('S.3'))).toBe('S.EW');
    expect(formatTcpFlags(tcpControlBits('.7'))).toBe('.EWA');
  });

  it('renders nothing for no flags', () => {
    expect(formatTcpFlags(tcpControlBits(''))).toBe('');
  });
});
