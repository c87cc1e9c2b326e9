#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { EnvConfigLoader } from './config/loader';
import { rpcUrlFor } from './config/networks';
import { DuneClient } from './services/providers/dune';
import { EvmTokenResolver, ViemErc20Reader } from './services/providers/evm';
import { runNetworks } from './services/pipeline';
import { writeLines } from './utils/output';

dotenv.config();

interface CliOptions {
  network?: string;
  out?: string;
  concurrency?: number;
  v1: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('missing-tokens')
  .description('Fetch the Dune V1/V2 missing tokens and write them with their ERC20 symbol and decimals')
  .version('1.0.0')
  .option('-n, --network <names>', 'comma-separated networks (overrides NETWORKS)')
  .option('-o, --out <dir>', 'output directory (overrides OUT_DIR)')
  .option('-c, --concurrency <n>', 'parallel token lookups', parsePositiveInt)
  .option('--no-v1', 'skip the legacy V1 query')
  .action(async (options: CliOptions) => {
    try {
      // 1. Load Configuration (CLI flags win over .env)
      const overrides: Record<string, string> = {};
      if (options.network !== undefined) overrides.NETWORKS = options.network;
      if (options.out !== undefined) overrides.OUT_DIR = options.out;
      if (options.concurrency !== undefined) overrides.RESOLVE_CONCURRENCY = String(options.concurrency);
      const config = EnvConfigLoader.load({ ...process.env, ...overrides });

      if (config.debug) {
        console.log(`[DEBUG] networks=${config.networks.join(',')} out=${config.outDir} concurrency=${config.concurrency}`);
      }

      // 2. Initialize Adapters
      const dune = new DuneClient(config.duneApiKey, { debug: config.debug });

      // 3. Run
      const summaries = await runNetworks(
        config,
        {
          queryClient: dune,
          createResolver: (profile) =>
            new EvmTokenResolver(
              new ViemErc20Reader(profile.chain, rpcUrlFor(profile, config)),
              config.debug
            ),
          writer: writeLines,
        },
        { includeV1: options.v1 }
      );

      const written = summaries.filter(s => s.status === 'written').length;
      console.log(`Done: ${summaries.length} network(s), ${written} with output.`);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

void program.parseAsync();
