import { randomInt } from 'crypto';
import { floor, mod } from '@tubular/math';

export const NTP_EPOCH_OFFSET = 2208988800; // Seconds before 1970-01-01 epoch for 1900-01-01 epoch

export type TimeSource = () => number; // Epoch milliseconds

const TWO_TO_32 = 0x100000000;
const NONCE_BITS = 0xFFF;

export interface NtpTimestamp {
  seconds: number; // Unsigned 32 bits, seconds since 1900-01-01 UTC (current era)
  fraction: number; // Unsigned 32 bits, binary fraction of a second
}

/**
 * A random 12-bit value for the low-order bits of an outgoing timestamp. Those bits are below
 * the precision the server claims, and filling them unpredictably keeps an off-path attacker
 * from forging a response that matches a client's request.
 */
export function randomNonce(): number {
  return randomInt(NONCE_BITS + 1);
}

/**
 * Convert epoch milliseconds (fractional milliseconds allowed) to an NTP timestamp, replacing the
 * low 12 bits of the fraction with `nonce`.
 */
export function toNtpTimestamp(millis: number, nonce = randomNonce()): NtpTimestamp {
  const unixSeconds = floor(millis / 1000);
  const fraction = floor((millis - unixSeconds * 1000) / 1000 * TWO_TO_32);

  return {
    seconds: mod(unixSeconds + NTP_EPOCH_OFFSET, TWO_TO_32),
    fraction: ((fraction & ~NONCE_BITS) | (nonce & NONCE_BITS)) >>> 0
  };
}

export function fromNtpTimestamp(ts: NtpTimestamp): number {
  return (ts.seconds + ts.fraction / TWO_TO_32 - NTP_EPOCH_OFFSET) * 1000;
}
