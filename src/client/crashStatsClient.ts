import { rawCrashRecordSchema, rawSearchResponseSchema } from '../types/raw';
import type { RawCrashRecord, RawSearchResponse } from '../types/raw';
import { getJson, type FetchLike } from './http';

export interface CrashStatsClientOptions {
  baseUrl: string;
  token?: string | undefined;
  fetch?: FetchLike | undefined;
}

export interface SearchParams {
  signature?: string | undefined;
  product: string;
  version?: string | undefined;
  platform?: string | undefined;
  cpuArch?: string | undefined;
  releaseChannel?: string | undefined;
  platformVersion?: string | undefined;
  processType?: string | undefined;
  days: number;
  limit: number;
  facets: string[];
  facetsSize?: number | undefined;
  sort: string;
}

// Public columns only; the row model has no room for anything else
const SEARCH_COLUMNS = [
  'uuid',
  'date',
  'signature',
  'product',
  'version',
  'platform',
  'platform_version',
  'build_id',
  'release_channel'
];

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildSearchQuery(params: SearchParams, now: Date = new Date()): URLSearchParams {
  const query = new URLSearchParams();
  query.append('product', params.product);
  query.append('_results_number', String(params.limit));
  query.append('_sort', params.sort);
  for (const column of SEARCH_COLUMNS) {
    query.append('_columns', column);
  }

  const since = new Date(now.getTime() - params.days * DAY_MS).toISOString().slice(0, 10);
  query.append('date', `>=${since}`);

  const filters: [string, string | undefined][] = [
    ['signature', params.signature],
    ['version', params.version],
    ['platform', params.platform],
    ['cpu_arch', params.cpuArch],
    ['release_channel', params.releaseChannel],
    ['platform_version', params.platformVersion],
    ['process_type', params.processType]
  ];
  for (const [name, value] of filters) {
    if (value !== undefined) query.append(name, value);
  }

  for (const facet of params.facets) {
    query.append('_facets', facet);
  }
  if (params.facetsSize !== undefined) {
    query.append('_facets_size', String(params.facetsSize));
  }

  return query;
}

export class CrashStatsClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CrashStatsClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  private headers(): Record<string, string> {
    return this.options.token ? { 'Auth-Token': this.options.token } : {};
  }

  async getCrash(crashId: string): Promise<RawCrashRecord> {
    const query = new URLSearchParams({ crash_id: crashId });
    return getJson(this.fetchImpl, `${this.options.baseUrl}/ProcessedCrash/?${query}`, rawCrashRecordSchema, {
      headers: this.headers(),
      notFoundMessage: `Crash not found: ${crashId}`
    });
  }

  async search(params: SearchParams, now?: Date): Promise<RawSearchResponse> {
    const query = buildSearchQuery(params, now);
    return getJson(this.fetchImpl, `${this.options.baseUrl}/SuperSearch/?${query}`, rawSearchResponseSchema, {
      headers: this.headers(),
      notFoundMessage: 'Search endpoint not found'
    });
  }
}
