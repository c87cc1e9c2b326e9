import { mainnet, gnosis } from 'viem/chains';
import type { Chain } from 'viem';
import type { AppConfig, Network, TokenRecord } from '../types';
import { UnsupportedNetworkError } from '../errors';

export type V1Style = 'bytea-tsv' | 'decode-tuple';

export interface NetworkProfile {
  network: Network;
  chain: Chain;
  // Dune V1 has one query per network
  v1QueryId: number;
  // value of the "Blockchain" enum parameter on Dune V2
  v2Name: string;
  v1Style: V1Style;
  nodeUrl(infuraKey: string): string;
}

export const V2_QUERY_ID = 1842715;

export const NATIVE_TOKEN: TokenRecord = Object.freeze({
  address: '0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE',
  symbol: 'ETH',
  decimals: 18,
});

const profiles: Record<Network, NetworkProfile> = {
  mainnet: {
    network: 'mainnet',
    chain: mainnet,
    v1QueryId: 1317323,
    v2Name: 'ethereum',
    v1Style: 'bytea-tsv',
    nodeUrl: (infuraKey) => `https://mainnet.infura.io/v3/${infuraKey}`,
  },
  gnosis: {
    network: 'gnosis',
    chain: gnosis,
    v1QueryId: 1403053,
    v2Name: 'gnosis',
    v1Style: 'decode-tuple',
    nodeUrl: () => 'https://rpc.gnosischain.com',
  },
};

export const SUPPORTED_NETWORKS: readonly Network[] = ['mainnet', 'gnosis'];

export function isNetwork(value: string): value is Network {
  return Object.prototype.hasOwnProperty.call(profiles, value);
}

export function getNetworkProfile(network: string): NetworkProfile {
  if (!isNetwork(network)) {
    throw new UnsupportedNetworkError(network);
  }
  return profiles[network];
}

/** The configured override for this network, else the profile's own endpoint. */
export function rpcUrlFor(profile: NetworkProfile, config: Pick<AppConfig, 'infuraKey' | 'rpcUrls'>): string {
  return config.rpcUrls[profile.network] ?? profile.nodeUrl(config.infuraKey);
}
