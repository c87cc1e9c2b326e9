import { getAddress, isAddress } from 'viem';
import type { Address } from '../types';

/**
 * Normalizes any-case hex input to its EIP-55 checksummed form, or returns
 * null when the value is not a 20-byte address.
 */
export function toChecksumAddress(raw: string): Address | null {
  const trimmed = raw.trim();
  if (!isAddress(trimmed, { strict: false })) return null;
  return getAddress(trimmed);
}

/** Drops the 0x prefix, keeping the digits as given. */
export function stripHexPrefix(address: string): string {
  return address.startsWith('0x') || address.startsWith('0X') ? address.slice(2) : address;
}
