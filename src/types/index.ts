import type { Address } from 'viem';
import type { ResolutionError } from '../errors';

export type { Address };

export type Network = 'mainnet' | 'gnosis';

export type EngineVersion = 'v1' | 'v2';

export interface TokenRecord {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
}

// Each list keeps the query's row order, duplicates and overlap included
export interface MissingTokenBatch {
  v1: Address[];
  v2: Address[];
}

export type ResolutionOutcome =
  | { ok: true; record: TokenRecord }
  | { ok: false; address: Address; error: ResolutionError };

export interface QueryParameter {
  name: string;
  value: string;
}

export interface QueryDescriptor {
  name: string;
  queryId: number;
  params: QueryParameter[];
}

export type QueryRow = Record<string, unknown>;

export interface AppConfig {
  infuraKey: string;
  duneApiKey: string;
  // validated per run, see UnsupportedNetworkError
  networks: string[];
  // endpoint overrides keyed by network name
  rpcUrls: Record<string, string>;
  outDir: string;
  concurrency: number;
  debug: boolean;
}

export type RunSummary =
  | { status: 'empty'; network: Network }
  | {
      status: 'written';
      network: Network;
      v1Count: number;
      v2Count: number;
      processed: number;
      skipped: Address[];
      files: string[];
    };
