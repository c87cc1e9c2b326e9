import { createPublicClient, http, parseAbi } from 'viem';
import type { Chain } from 'viem';
import type { Erc20Reader, TokenMetadataResolver } from './interface';
import type { Address, TokenRecord } from '../../types';
import { NATIVE_TOKEN } from '../../config/networks';
import { ResolutionError } from '../../errors';
import { toChecksumAddress } from '../../utils/address';

// ERC20 min ABI
const erc20Abi = parseAbi([
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
]);

function createClient(chain: Chain, rpcUrl: string) {
  return createPublicClient({
    chain: chain,
    transport: http(rpcUrl),
  });
}

export class ViemErc20Reader implements Erc20Reader {
  private readonly client: ReturnType<typeof createClient>;

  constructor(chain: Chain, rpcUrl: string) {
    this.client = createClient(chain, rpcUrl);
  }

  readSymbol(address: Address): Promise<string> {
    return this.client.readContract({ address, abi: erc20Abi, functionName: 'symbol' });
  }

  readDecimals(address: Address): Promise<number> {
    return this.client.readContract({ address, abi: erc20Abi, functionName: 'decimals' });
  }
}

export class EvmTokenResolver implements TokenMetadataResolver {
  constructor(
    private readonly reader: Erc20Reader,
    private readonly debugEnabled: boolean = false
  ) { }

  async resolve(address: Address): Promise<TokenRecord> {
    const checksummed = toChecksumAddress(address);
    if (!checksummed) {
      throw new ResolutionError(address, { cause: new Error('not an EVM address') });
    }

    if (checksummed === NATIVE_TOKEN.address) {
      return NATIVE_TOKEN;
    }

    // No retry here: a single failed read drops the token
    let symbol: unknown;
    let decimals: unknown;
    try {
      symbol = await this.reader.readSymbol(checksummed);
      decimals = await this.reader.readDecimals(checksummed);
    } catch (e) {
      throw new ResolutionError(checksummed, { cause: e });
    }

    if (typeof symbol !== 'string') {
      throw new ResolutionError(checksummed, { cause: new Error(`symbol() returned ${String(symbol)}`) });
    }
    if (typeof decimals !== 'number' || !Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
      throw new ResolutionError(checksummed, { cause: new Error(`decimals() returned ${String(decimals)}`) });
    }

    if (this.debugEnabled) {
      console.log(`[DEBUG] ERC20 details: ${checksummed} => ${symbol} (${decimals})`);
    }

    return Object.freeze({ address: checksummed, symbol, decimals });
  }
}
