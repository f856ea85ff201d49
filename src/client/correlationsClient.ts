import { createHash } from 'node:crypto';
import { rawCorrelationResponseSchema, rawCorrelationTotalsSchema } from '../types/raw';
import type { RawCorrelationResponse, RawCorrelationTotals } from '../types/raw';
import { getJson, type FetchLike } from './http';

export interface CorrelationsClientOptions {
  baseUrl: string;
  fetch?: FetchLike | undefined;
}

// Per-signature files on the CDN are named after the SHA-1 of the signature
export function signatureHash(signature: string): string {
  return createHash('sha1').update(signature, 'utf8').digest('hex');
}

// Correlations are public, precomputed data: no token is ever sent
export class CorrelationsClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CorrelationsClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getTotals(): Promise<RawCorrelationTotals> {
    return getJson(this.fetchImpl, `${this.options.baseUrl}/all.json.gz`, rawCorrelationTotalsSchema, {
      notFoundMessage: 'Correlation totals not found'
    });
  }

  async getCorrelations(signature: string, channel: string): Promise<RawCorrelationResponse> {
    const url = `${this.options.baseUrl}/${channel}/${signatureHash(signature)}.json.gz`;
    return getJson(this.fetchImpl, url, rawCorrelationResponseSchema, {
      notFoundMessage:
        `No correlation data for signature "${signature}" on channel "${channel}". ` +
        'Correlations are only available for the top ~200 signatures per channel.'
    });
  }
}
