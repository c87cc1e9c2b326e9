import type { TokenRecord } from '../types';
import { getNetworkProfile } from '../config/networks';
import { stripHexPrefix } from './address';

/**
 * Dune V1 representation of an ERC20 token. Each network's V1 token table
 * has its own literal shape:
 *
 * - mainnet (COPY text): `\\x96B00208911d72eA9f10c3303fF319427A7884C9	BLUE	18`
 * - gnosis (SQL values): `('BAND', 18, decode('e154A435408211AC89757B76C4FbE4Dc9ED2Ef27', 'hex')),`
 */
export function formatV1(record: TokenRecord, network: string): string {
  const { symbol, decimals } = record;
  const hex = stripHexPrefix(record.address);

  switch (getNetworkProfile(network).v1Style) {
    case 'bytea-tsv':
      return `\\\\x${hex}\t${symbol}\t${decimals}`;
    case 'decode-tuple':
      return `('${symbol}', ${decimals}, decode('${hex}', 'hex')),`;
  }
}

/**
 * Dune V2 representation, the same on every network:
 * `('0xfcc5c47be19d06bf83eb04298b026f81069ff65b', 'yCRV', 18),`
 */
export function formatV2(record: TokenRecord): string {
  return `('${record.address.toLowerCase()}', '${record.symbol}', ${record.decimals}),`;
}
