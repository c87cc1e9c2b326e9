import type { MissingTokenSource, QueryClient } from './interface';
import { queryUrl } from './dune';
import type { Address, EngineVersion, Network, QueryDescriptor, QueryRow } from '../../types';
import { getNetworkProfile, V2_QUERY_ID } from '../../config/networks';
import { SourceQueryError } from '../../errors';
import { toChecksumAddress } from '../../utils/address';

/**
 * Reads the "missing tokens" query of one Dune engine version. The `token`
 * column of every row must hold an address; otherwise the whole list is
 * rejected.
 */
export class DuneMissingTokenSource implements MissingTokenSource {
  constructor(
    readonly engine: EngineVersion,
    private readonly network: Network,
    private readonly query: QueryDescriptor,
    private readonly client: QueryClient
  ) { }

  async fetch(): Promise<Address[]> {
    console.log(`Fetching ${this.engine.toUpperCase()} missing tokens for ${this.network} from ${queryUrl(this.query)}`);

    let rows: QueryRow[];
    try {
      rows = await this.client.refresh(this.query);
    } catch (e) {
      if (e instanceof SourceQueryError) throw e;
      throw new SourceQueryError(this.query.name, 'query service unavailable', { cause: e });
    }

    return rows.map((row, index) => {
      const token = row['token'];
      if (typeof token !== 'string') {
        throw new SourceQueryError(this.query.name, `row ${index} has no token column`);
      }
      const address = toChecksumAddress(token);
      if (!address) {
        throw new SourceQueryError(this.query.name, `row ${index} has invalid token ${token}`);
      }
      return address;
    });
  }
}

export function missingTokensQuery(engine: EngineVersion, network: Network): QueryDescriptor {
  const profile = getNetworkProfile(network);
  if (engine === 'v1') {
    return { name: 'V1: Missing Tokens', queryId: profile.v1QueryId, params: [] };
  }
  return {
    name: 'V2: Missing Tokens',
    queryId: V2_QUERY_ID,
    params: [{ name: 'Blockchain', value: profile.v2Name }],
  };
}

export function createMissingTokenSources(
  network: Network,
  client: QueryClient
): Record<EngineVersion, MissingTokenSource> {
  return {
    v1: new DuneMissingTokenSource('v1', network, missingTokensQuery('v1', network), client),
    v2: new DuneMissingTokenSource('v2', network, missingTokensQuery('v2', network), client),
  };
}
