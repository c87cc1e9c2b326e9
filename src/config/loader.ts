import { z } from 'zod';
import type { AppConfig } from '../types';
import { ConfigError } from '../errors';

const commaSeparatedString = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter((s) => s.length > 0));

const envSchema = z.object({
  INFURA_KEY: z.string({ required_error: 'required' }),
  DUNE_API_KEY: z.string({ required_error: 'required' }),
  NETWORKS: commaSeparatedString
    .pipe(z.array(z.string()).min(1, 'NETWORKS must name at least one network'))
    .default('mainnet'),
  OUT_DIR: z.string().min(1).default('./out'),
  RESOLVE_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  MT_DEBUG: z.string().optional(),
});

// RPC_URL_GNOSIS=... overrides the gnosis endpoint only
const RPC_URL_PREFIX = 'RPC_URL_';
const rpcUrlsSchema = z.record(z.string().url('must be a URL'));

export class EnvConfigLoader {
  static load(env: NodeJS.ProcessEnv): AppConfig {
    // Empty values count as unset ("KEY=" lines in .env)
    const present = Object.fromEntries(
      Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = envSchema.safeParse(present);
    const rpcUrls = rpcUrlsSchema.safeParse(
      Object.fromEntries(Object.entries(present).filter(([key]) => key.startsWith(RPC_URL_PREFIX)))
    );
    if (!parsed.success || !rpcUrls.success) {
      const issues = [...(parsed.success ? [] : parsed.error.issues), ...(rpcUrls.success ? [] : rpcUrls.error.issues)];
      throw new ConfigError(issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`));
    }

    const vars = parsed.data;
    return {
      infuraKey: vars.INFURA_KEY,
      duneApiKey: vars.DUNE_API_KEY,
      networks: vars.NETWORKS,
      rpcUrls: Object.fromEntries(
        Object.entries(rpcUrls.data).map(([key, url]) => [key.slice(RPC_URL_PREFIX.length).toLowerCase(), url])
      ),
      outDir: vars.OUT_DIR,
      concurrency: vars.RESOLVE_CONCURRENCY,
      debug: vars.MT_DEBUG === '1',
    };
  }
}
