import { rawCrashPingStackSchema, rawCrashPingsSchema } from '../types/raw';
import type { RawCrashPingStack, RawCrashPings } from '../types/raw';
import { getJson, type FetchLike } from './http';

export interface CrashPingsClientOptions {
  baseUrl: string;
  fetch?: FetchLike | undefined;
}

export class CrashPingsClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CrashPingsClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getPings(date: string): Promise<RawCrashPings> {
    return getJson(this.fetchImpl, `${this.options.baseUrl}/ping_data/${date}`, rawCrashPingsSchema, {
      notFoundMessage: `No crash ping data for date ${date}. Data is available from September 2024 onwards.`,
      acceptedMessage:
        `Crash ping data for ${date} is not available yet. ` +
        "The previous day's data typically appears around 04:00 UTC."
    });
  }

  async getStack(date: string, crashId: string): Promise<RawCrashPingStack> {
    const url = `${this.options.baseUrl}/stack/${date}/${encodeURIComponent(crashId)}`;
    return getJson(this.fetchImpl, url, rawCrashPingStackSchema, {
      notFoundMessage: `Stack not found for crash ping ${crashId} on ${date}`
    });
  }
}
