import { getLogger } from '@fluidware-it/saddlebag';
import type { CrashStatsClient, SearchParams } from '../client/crashStatsClient';
import { normalizeSearch } from '../normalizers/searchNormalizer';
import { render, type OutputFormat } from '../renderers';

export async function runSearch(
  client: Pick<CrashStatsClient, 'search'>,
  params: SearchParams,
  format: OutputFormat,
  now?: Date
): Promise<string> {
  getLogger().debug(`Searching ${params.product} crashes from the last ${params.days} day(s)`);

  const raw = await client.search(params, now);
  const result = normalizeSearch(raw, params.limit, params.facets, params.facetsSize);
  return render(format, result);
}
