import { describe, it, expect } from 'vitest';
import { EnvConfigLoader } from '../src/config/loader';
import { ConfigError } from '../src/errors';

const base = { INFURA_KEY: 'test-infura', DUNE_API_KEY: 'test-dune' };

function issuesOf(env: NodeJS.ProcessEnv): string[] {
  try {
    EnvConfigLoader.load(env);
  } catch (e) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('EnvConfigLoader', () => {
  it('applies defaults', () => {
    expect(EnvConfigLoader.load(base)).toEqual({
      infuraKey: 'test-infura',
      duneApiKey: 'test-dune',
      networks: ['mainnet'],
      rpcUrls: {},
      outDir: './out',
      concurrency: 1,
      debug: false,
    });
  });

  it('reads optional settings', () => {
    const config = EnvConfigLoader.load({
      ...base,
      NETWORKS: ' mainnet , gnosis ,',
      RPC_URL_GNOSIS: 'http://localhost:8545',
      OUT_DIR: 'patches',
      RESOLVE_CONCURRENCY: '4',
      MT_DEBUG: '1',
    });

    expect(config).toMatchObject({
      networks: ['mainnet', 'gnosis'],
      rpcUrls: { gnosis: 'http://localhost:8545' },
      outDir: 'patches',
      concurrency: 4,
      debug: true,
    });
  });

  it('keys endpoint overrides by network', () => {
    const config = EnvConfigLoader.load({
      ...base,
      RPC_URL_MAINNET: 'http://localhost:8545',
      RPC_URL_GNOSIS: 'http://localhost:8546',
      RPC_URL_POLYGON: '',
    });

    expect(config.rpcUrls).toEqual({ mainnet: 'http://localhost:8545', gnosis: 'http://localhost:8546' });
  });

  it('rejects an endpoint override that is not a URL', () => {
    expect(issuesOf({ ...base, RPC_URL_GNOSIS: 'localhost' })).toEqual(['RPC_URL_GNOSIS: must be a URL']);
  });

  it('leaves network names for the run to check', () => {
    expect(EnvConfigLoader.load({ ...base, NETWORKS: 'polygon' }).networks).toEqual(['polygon']);
  });

  it('lists every missing secret', () => {
    expect(issuesOf({})).toEqual(['INFURA_KEY: required', 'DUNE_API_KEY: required']);
  });

  it('treats empty values as missing', () => {
    expect(issuesOf({ ...base, INFURA_KEY: '' })).toEqual(['INFURA_KEY: required']);
  });

  it('rejects an invalid concurrency', () => {
    expect(issuesOf({ ...base, RESOLVE_CONCURRENCY: '0' })).toHaveLength(1);
    expect(issuesOf({ ...base, RESOLVE_CONCURRENCY: 'many' })).toHaveLength(1);
  });

  it('rejects a network list with no names', () => {
    expect(issuesOf({ ...base, NETWORKS: ' , ' })).toEqual(['NETWORKS: NETWORKS must name at least one network']);
  });

  it('reports problems through ConfigError', () => {
    expect(() => EnvConfigLoader.load({ DUNE_API_KEY: 'test-dune' })).toThrow(
      'Invalid configuration: INFURA_KEY: required'
    );
  });
});
