import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { QueryClient } from './interface';
import type { QueryDescriptor, QueryRow } from '../../types';
import { SourceQueryError } from '../../errors';

export const DUNE_API_URL = 'https://api.dune.com/api/v1';

const executeResponse = z.object({
  execution_id: z.string().min(1),
});

const statusResponse = z.object({
  state: z.string(),
});

const resultsResponse = z.object({
  result: z.object({
    rows: z.array(z.record(z.unknown())),
  }),
});

const FAILED_STATES = new Set(['QUERY_STATE_FAILED', 'QUERY_STATE_CANCELLED', 'QUERY_STATE_EXPIRED']);

export interface DuneClientOptions {
  baseURL?: string;
  pollIntervalMs?: number;
  maxWaitMs?: number;
  debug?: boolean;
}

export function queryUrl(query: QueryDescriptor): string {
  return `https://dune.com/queries/${query.queryId}`;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Minimal Dune API client: executes a saved query, waits for it to finish and
 * returns its rows.
 */
export class DuneClient implements QueryClient {
  private readonly http: AxiosInstance;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly debugEnabled: boolean;

  constructor(apiKey: string, options: DuneClientOptions = {}) {
    this.http = axios.create({
      baseURL: options.baseURL ?? DUNE_API_URL,
      headers: { 'X-Dune-API-Key': apiKey },
    });
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.maxWaitMs = options.maxWaitMs ?? 10 * 60 * 1000;
    this.debugEnabled = options.debug ?? false;
  }

  async refresh(query: QueryDescriptor): Promise<QueryRow[]> {
    const executionId = await this.execute(query);
    await this.waitForCompletion(query, executionId);

    const { data } = await this.request(query, () => this.http.get(`/execution/${executionId}/results`));
    const parsed = resultsResponse.safeParse(data);
    if (!parsed.success) {
      throw new SourceQueryError(query.name, 'malformed results response', { cause: parsed.error });
    }
    return parsed.data.result.rows;
  }

  private async execute(query: QueryDescriptor): Promise<string> {
    const queryParameters = Object.fromEntries(query.params.map(p => [p.name, p.value]));
    const { data } = await this.request(query, () =>
      this.http.post(`/query/${query.queryId}/execute`, { query_parameters: queryParameters })
    );
    const parsed = executeResponse.safeParse(data);
    if (!parsed.success) {
      throw new SourceQueryError(query.name, 'malformed execute response', { cause: parsed.error });
    }
    if (this.debugEnabled) {
      console.log(`[DEBUG] ${query.name}: execution ${parsed.data.execution_id} started`);
    }
    return parsed.data.execution_id;
  }

  private async waitForCompletion(query: QueryDescriptor, executionId: string): Promise<void> {
    const deadline = Date.now() + this.maxWaitMs;

    while (true) {
      const { data } = await this.request(query, () => this.http.get(`/execution/${executionId}/status`));
      const parsed = statusResponse.safeParse(data);
      if (!parsed.success) {
        throw new SourceQueryError(query.name, 'malformed status response', { cause: parsed.error });
      }

      const { state } = parsed.data;
      if (state === 'QUERY_STATE_COMPLETED') return;
      if (FAILED_STATES.has(state)) {
        throw new SourceQueryError(query.name, `execution ${executionId} ended in ${state}`);
      }
      if (Date.now() >= deadline) {
        throw new SourceQueryError(query.name, `execution ${executionId} still ${state} after ${this.maxWaitMs}ms`);
      }

      if (this.debugEnabled) {
        console.log(`[DEBUG] ${query.name}: ${state}`);
      }
      await sleep(this.pollIntervalMs);
    }
  }

  private async request<T>(query: QueryDescriptor, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (e) {
      const reason = axios.isAxiosError(e)
        ? `request failed${e.response ? ` with status ${e.response.status}` : ''}: ${e.message}`
        : 'request failed';
      throw new SourceQueryError(query.name, reason, { cause: e });
    }
  }
}
