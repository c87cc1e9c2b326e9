import type { Address, MissingTokenBatch, ResolutionOutcome, TokenRecord } from '../types';
import type { TokenMetadataResolver } from './providers/interface';
import { ResolutionError } from '../errors';
import { toChecksumAddress } from '../utils/address';

export type Reconciliation =
  | { status: 'empty' }
  | {
      status: 'resolved';
      v1: TokenRecord[];
      v2: TokenRecord[];
      resolved: number;
      skipped: Address[];
    };

export interface ReconcileOptions {
  concurrency?: number;
  onProgress?: (done: number, total: number) => void;
  debug?: boolean;
}

export function isEmptyBatch(batch: MissingTokenBatch): boolean {
  return batch.v1.length === 0 && batch.v2.length === 0;
}

// Non-addresses pass through unchanged and fail in the resolver
const normalize = (address: Address): Address => toChecksumAddress(address) ?? address;

/** Union of both lists by checksummed address, first-seen order (v1 before v2). */
export function distinctTokens(batch: MissingTokenBatch): Address[] {
  return [...new Set([...batch.v1, ...batch.v2].map(normalize))];
}

export class ReconciliationEngine {
  private readonly concurrency: number;

  constructor(
    private resolver: TokenMetadataResolver,
    private options: ReconcileOptions = {}
  ) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  async reconcile(batch: MissingTokenBatch): Promise<Reconciliation> {
    if (isEmptyBatch(batch)) {
      return { status: 'empty' };
    }

    // 1. Work set: each distinct address is resolved exactly once
    const workSet = distinctTokens(batch);
    if (this.options.debug) {
      console.log(`[DEBUG] work set=${workSet.length} (V1=${batch.v1.length}, V2=${batch.v2.length})`);
    }

    // 2. Resolve
    const outcomes = await this.resolveAll(workSet);

    const records = new Map<Address, TokenRecord>();
    const skipped: Address[] = [];
    for (const address of workSet) {
      const outcome = outcomes.get(address);
      if (outcome?.ok === true) {
        records.set(address, outcome.record);
      } else {
        skipped.push(address);
      }
    }

    // 3. Project back onto each list, keeping its own order
    const project = (list: Address[]): TokenRecord[] =>
      list.flatMap(address => {
        const record = records.get(normalize(address));
        return record ? [record] : [];
      });

    return {
      status: 'resolved',
      v1: project(batch.v1),
      v2: project(batch.v2),
      resolved: records.size,
      skipped,
    };
  }

  private async resolveAll(workSet: Address[]): Promise<Map<Address, ResolutionOutcome>> {
    // Keyed by address, so completion order never leaks into the output
    const outcomes = new Map<Address, ResolutionOutcome>();
    let cursor = 0;
    let done = 0;
    // First fatal error; once set, no worker picks up another address
    const run: { failure?: { error: unknown } } = {};

    const worker = async (): Promise<void> => {
      while (!run.failure && cursor < workSet.length) {
        const address = workSet[cursor++];
        try {
          outcomes.set(address, await this.resolveOne(address));
        } catch (e) {
          run.failure ??= { error: e };
          return;
        }
        done++;
        this.options.onProgress?.(done, workSet.length);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, workSet.length) }, () => worker());
    await Promise.all(workers);
    if (run.failure) throw run.failure.error;
    return outcomes;
  }

  private async resolveOne(address: Address): Promise<ResolutionOutcome> {
    try {
      return { ok: true, record: await this.resolver.resolve(address) };
    } catch (e) {
      if (!(e instanceof ResolutionError)) throw e;
      console.warn(`Something wrong with token ${address} - skipping.`);
      if (this.options.debug) {
        console.log(`[DEBUG] ${address}: ${e.cause instanceof Error ? e.cause.message : String(e.cause)}`);
      }
      return { ok: false, address, error: e };
    }
  }
}
