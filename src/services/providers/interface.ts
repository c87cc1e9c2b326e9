import type { Address, EngineVersion, QueryDescriptor, QueryRow, TokenRecord } from '../../types';

export interface QueryClient {
  refresh(query: QueryDescriptor): Promise<QueryRow[]>;
}

export interface MissingTokenSource {
  readonly engine: EngineVersion;
  fetch(): Promise<Address[]>;
}

export interface Erc20Reader {
  readSymbol(address: Address): Promise<unknown>;
  readDecimals(address: Address): Promise<unknown>;
}

export interface TokenMetadataResolver {
  resolve(address: Address): Promise<TokenRecord>;
}
