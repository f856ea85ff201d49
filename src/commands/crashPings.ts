import { getLogger } from '@fluidware-it/saddlebag';
import type { CrashPingsClient } from '../client/crashPingsClient';
import { UsageError } from '../client/errors';
import {
  CRASH_PING_FACETS,
  isCrashPingFacet,
  normalizeCrashPings,
  type CrashPingFilters
} from '../normalizers/crashPingsNormalizer';
import { normalizeCrashPingStack } from '../normalizers/crashPingStackNormalizer';
import { render, type OutputFormat } from '../renderers';
import { extractCrashId } from './crash';

export interface CrashPingsCommandOptions {
  date?: string | undefined;
  filters: CrashPingFilters;
  facet: string;
  limit: number;
  // Crash ping ID; switches from aggregation to that ping's stack
  stack?: string | undefined;
  format: OutputFormat;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

// Ping data is published per UTC day; the most recent complete day is yesterday
export function yesterdayUtc(now: Date = new Date()): string {
  return new Date(now.getTime() - DAY_MS).toISOString().slice(0, 10);
}

export async function runCrashPings(
  client: Pick<CrashPingsClient, 'getPings' | 'getStack'>,
  options: CrashPingsCommandOptions,
  now?: Date
): Promise<string> {
  const { facet } = options;
  if (!isCrashPingFacet(facet)) {
    throw new UsageError(`Unknown facet "${facet}". Expected one of: ${CRASH_PING_FACETS.join(', ')}`);
  }
  const date = options.date ?? yesterdayUtc(now);
  if (!DATE_PATTERN.test(date)) {
    throw new UsageError(`Invalid date "${date}": expected YYYY-MM-DD`);
  }

  if (options.stack !== undefined) {
    const crashId = extractCrashId(options.stack);
    getLogger().debug(`Fetching stack for crash ping ${crashId} on ${date}`);
    const raw = await client.getStack(date, crashId);
    return render(options.format, normalizeCrashPingStack(raw, crashId, date));
  }

  getLogger().debug(`Fetching crash pings for ${date}`);
  const raw = await client.getPings(date);

  const summary = normalizeCrashPings(raw, options.filters, facet, options.limit, date);
  return render(options.format, summary);
}
