/**
 * tcpcraft — TCP flag grammar
 *
 * Flag strings use tcpdump-style letters plus an Accurate-ECN shorthand:
 *
 *   .        ACK
 *   F S R P  FIN SYN RST PSH
 *   E W A    ECE CWR AE        (legacy ECN markers)
 *   0 … 7    ACE codepoint     (bit0 → ECE, bit1 → CWR, bit2 → AE)
 *
 * The three ECN bits are set either by letters or by one numeral, never both.
 * Validation is a single left-to-right scan over an explicit state:
 *
 *   none ──E/W/A──▶ ecn ──0-7──▶ conflict
 *   none ──0-7────▶ ace ──E/W/A or 0-7──▶ conflict
 *
 * The character that triggers the first conflict is the one reported.
 */

import { TcpPacketError } from './errors';
import type { TcpControlBits } from './types';

// ─── Alphabet ─────────────────────────────────────────────────────────────────

/** Every legal flag character. '.' first since it is the most common. */
export const VALID_TCP_FLAGS = '.FSRPEWA01234567';

const ECN_FLAGS = 'EWA';
const ACE_FLAGS = '01234567';

type EcnScanState = 'none' | 'ecn' | 'ace';

// ─── Validation ───────────────────────────────────────────────────────────────

/**
 * Check a flag string against the alphabet and the ECN/ACE exclusivity rule.
 * Returns null when the string is valid.
 */
export function validateTcpFlags(flags: string): TcpPacketError | null {
  let state: EcnScanState = 'none';

  for (const c of flags) {
    if (!VALID_TCP_FLAGS.includes(c)) {
      return new TcpPacketError('grammar', `Invalid TCP flag: '${c}'`);
    }

    if (ECN_FLAGS.includes(c)) {
      if (state === 'ace') return conflict(c);
      state = 'ecn';
    } else if (ACE_FLAGS.includes(c)) {
      if (state !== 'none') return conflict(c);
      state = 'ace';
    }
  }

  return null;
}

function conflict(c: string): TcpPacketError {
  return new TcpPacketError('grammar', `Conflicting TCP flag: '${c}'`);
}

// ─── Derivation ───────────────────────────────────────────────────────────────

/** Value of the first ACE numeral in `flags`, or null if there is none. */
export function aceCodepoint(flags: string): number | null {
  for (const c of flags) {
    if (ACE_FLAGS.includes(c)) return c.charCodeAt(0) - 0x30;
  }
  return null;
}

/**
 * Derive the TCP control bits from a validated flag string.
 *
 * With an ACE numeral present the ECN bits come from its binary expansion
 * and the E/W/A letters are not consulted (validation rules them out).
 * URG is never set.
 */
export function tcpControlBits(flags: string): TcpControlBits {
  const ace = aceCodepoint(flags);

  return {
    fin: flags.includes('F'),
    syn: flags.includes('S'),
    rst: flags.includes('R'),
    psh: flags.includes('P'),
    ack: flags.includes('.'),
    urg: false,
    ece: ace !== null ? (ace & 1) !== 0 : flags.includes('E'),
    cwr: ace !== null ? (ace & 2) !== 0 : flags.includes('W'),
    ae:  ace !== null ? (ace & 4) !== 0 : flags.includes('A'),
  };
}

// ─── Rendering ────────────────────────────────────────────────────────────────

/**
 * Render control bits back into flag letters, in the order F S R P . E W A.
 * URG has no letter in the grammar and is rendered as 'U' after '.'.
 * ECN bits always render as letters, never as an ACE numeral.
 */
export function formatTcpFlags(bits: TcpControlBits): string {
  let out = '';
  if (bits.fin) out += 'F';
  if (bits.syn) out += 'S';
  if (bits.rst) out += 'R';
  if (bits.psh) out += 'P';
  if (bits.ack) out += '.';
  if (bits.urg) out += 'U';
  if (bits.ece) out += 'E';
  if (bits.cwr) out += 'W';
  if (bits.ae)  out += 'A';
  return out;
}
