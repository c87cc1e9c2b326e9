import path from 'path';
import type { AppConfig, EngineVersion, MissingTokenBatch, Network, RunSummary } from '../types';
import type { MissingTokenSource, QueryClient, TokenMetadataResolver } from './providers/interface';
import { createMissingTokenSources } from './providers/missingTokens';
import { ReconciliationEngine } from './reconciler';
import { getNetworkProfile } from '../config/networks';
import type { NetworkProfile } from '../config/networks';
import { UnsupportedNetworkError } from '../errors';
import { formatV1, formatV2 } from '../utils/format';
import type { LineWriter } from '../utils/output';

export const V1_OUTPUT_FILE = 'missing-tokens-v1.txt';
export const V2_OUTPUT_FILE = 'missing-tokens-v2.txt';

export interface PipelineDeps {
  sources: Record<EngineVersion, MissingTokenSource>;
  resolver: TokenMetadataResolver;
  writer: LineWriter;
  outDir: string;
  concurrency?: number;
  // V1 is deprecated on Dune; allows running against V2 only
  includeV1?: boolean;
  debug?: boolean;
}

function progressReporter(): (done: number, total: number) => void {
  const step = (total: number) => Math.max(1, Math.floor(total / 10));
  return (done, total) => {
    if (done === total || done % step(total) === 0) {
      console.log(`  ${done}/${total} tokens resolved`);
    }
  };
}

/** Fetches, reconciles and writes the missing-token files for one network. */
export async function runMissingTokens(network: Network, deps: PipelineDeps): Promise<RunSummary> {
  const batch: MissingTokenBatch = {
    v1: deps.includeV1 === false ? [] : await deps.sources.v1.fetch(),
    v2: await deps.sources.v2.fetch(),
  };

  const engine = new ReconciliationEngine(deps.resolver, {
    concurrency: deps.concurrency,
    onProgress: progressReporter(),
    debug: deps.debug,
  });

  if (batch.v1.length > 0 || batch.v2.length > 0) {
    console.log(
      `Found ${batch.v1.length} missing tokens on V1 and ${batch.v2.length} on V2. Fetching token details...\n`
    );
  }

  const result = await engine.reconcile(batch);
  if (result.status === 'empty') {
    console.log(`No missing tokens detected on ${network}. Have a good day!`);
    return { status: 'empty', network };
  }

  console.log('Processing results...\n');
  // Format everything first so that an unsupported network writes nothing
  const v1Lines = result.v1.map(record => formatV1(record, network));
  const v2Lines = result.v2.map(formatV2);

  const files = [
    deps.writer(deps.outDir, V1_OUTPUT_FILE, v1Lines),
    deps.writer(deps.outDir, V2_OUTPUT_FILE, v2Lines),
  ];

  console.log(`${result.resolved} tokens processed, ${result.skipped.length} skipped`);
  if (result.skipped.length > 0) {
    console.warn(`Skipped tokens: ${result.skipped.join(', ')}`);
  }

  return {
    status: 'written',
    network,
    v1Count: v1Lines.length,
    v2Count: v2Lines.length,
    processed: result.resolved,
    skipped: result.skipped,
    files,
  };
}

export interface NetworkAdapters {
  queryClient: QueryClient;
  createResolver(profile: NetworkProfile): TokenMetadataResolver;
  writer: LineWriter;
}

/**
 * Runs every configured network in order. An unsupported network is reported
 * and skipped; the others still run, and the failure is rethrown at the end.
 */
export async function runNetworks(
  config: AppConfig,
  adapters: NetworkAdapters,
  options: { includeV1?: boolean } = {}
): Promise<RunSummary[]> {
  const summaries: RunSummary[] = [];
  const unsupported: string[] = [];

  for (const name of config.networks) {
    console.log(`Execute on Network ${name}`);
    let profile: NetworkProfile;
    try {
      profile = getNetworkProfile(name);
    } catch (error) {
      if (!(error instanceof UnsupportedNetworkError)) throw error;
      console.error(error.message);
      unsupported.push(name);
      continue;
    }

    summaries.push(
      await runMissingTokens(profile.network, {
        sources: createMissingTokenSources(profile.network, adapters.queryClient),
        resolver: adapters.createResolver(profile),
        writer: adapters.writer,
        // File names are fixed, so several networks each get a subdirectory
        outDir: config.networks.length > 1 ? path.join(config.outDir, profile.network) : config.outDir,
        concurrency: config.concurrency,
        includeV1: options.includeV1,
        debug: config.debug,
      })
    );
  }

  if (unsupported.length > 0) {
    throw new UnsupportedNetworkError(unsupported.join(', '));
  }
  return summaries;
}
