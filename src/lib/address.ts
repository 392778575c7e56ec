/**
 * EVM address helpers
 */

import { getAddress, isAddress } from 'viem';

/**
 * Checksummed form of an address, or null when it is not one
 */
export function normalizeAddress(value: string): string | null {
  if (!isAddress(value, { strict: false })) {
    return null;
  }
  return getAddress(value);
}

/**
 * Normalize a list, dropping duplicates. Returns null if any entry is invalid.
 */
export function normalizeAddressList(values: string[]): string[] | null {
  const out = new Set<string>();
  for (const value of values) {
    const normalized = normalizeAddress(value);
    if (normalized === null) {
      return null;
    }
    out.add(normalized);
  }
  return [...out];
}
