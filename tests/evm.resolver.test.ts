import { describe, it, expect, vi } from 'vitest';
import { EvmTokenResolver } from '../src/services/providers/evm';
import { NATIVE_TOKEN } from '../src/config/networks';
import { ResolutionError } from '../src/errors';
import { MIXED, MIXED_LOWER, YCRV, YCRV_LOWER } from './fixtures';

function fakeReader(symbol: unknown = 'yCRV', decimals: unknown = 18) {
  return {
    readSymbol: vi.fn(async () => symbol),
    readDecimals: vi.fn(async () => decimals),
  };
}

describe('EvmTokenResolver', () => {
  it('returns the native record for the sentinel address without any contract call', async () => {
    const reader = fakeReader();
    const resolver = new EvmTokenResolver(reader);

    const record = await resolver.resolve('0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee');

    expect(record).toEqual({ address: '0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE', symbol: 'ETH', decimals: 18 });
    expect(record).toBe(NATIVE_TOKEN);
    expect(reader.readSymbol).not.toHaveBeenCalled();
    expect(reader.readDecimals).not.toHaveBeenCalled();
  });

  it('reads symbol and decimals from the checksummed contract address', async () => {
    const reader = fakeReader('yCRV', 18);
    const resolver = new EvmTokenResolver(reader);

    const record = await resolver.resolve(YCRV_LOWER);

    expect(record).toEqual({ address: YCRV, symbol: 'yCRV', decimals: 18 });
    expect(reader.readSymbol).toHaveBeenCalledTimes(1);
    expect(reader.readSymbol).toHaveBeenCalledWith(YCRV);
    expect(reader.readDecimals).toHaveBeenCalledTimes(1);
    expect(reader.readDecimals).toHaveBeenCalledWith(YCRV);
  });

  it('returns frozen records', async () => {
    const record = await new EvmTokenResolver(fakeReader('MIX', 6)).resolve(MIXED_LOWER);

    expect(record.address).toBe(MIXED);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('wraps reader failures in a ResolutionError', async () => {
    const reader = fakeReader();
    const cause = new Error('execution reverted');
    reader.readDecimals.mockRejectedValueOnce(cause);

    const error = await new EvmTokenResolver(reader).resolve(YCRV).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({ address: YCRV, cause });
  });

  it('rejects a non-string symbol', async () => {
    await expect(new EvmTokenResolver(fakeReader(42, 18)).resolve(YCRV)).rejects.toBeInstanceOf(ResolutionError);
  });

  it('rejects decimals outside of uint8', async () => {
    await expect(new EvmTokenResolver(fakeReader('BIG', 256)).resolve(YCRV)).rejects.toBeInstanceOf(ResolutionError);
    await expect(new EvmTokenResolver(fakeReader('NEG', -1)).resolve(YCRV)).rejects.toBeInstanceOf(ResolutionError);
    await expect(new EvmTokenResolver(fakeReader('FRAC', 1.5)).resolve(YCRV)).rejects.toBeInstanceOf(ResolutionError);
  });

  it('accepts zero decimals', async () => {
    const record = await new EvmTokenResolver(fakeReader('ZERO', 0)).resolve(YCRV);
    expect(record.decimals).toBe(0);
  });
});
