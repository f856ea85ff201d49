import type { IndexedStrings, NullableIndexedStrings, RawCrashPings } from '../types/raw';
import type { CrashPingsItem, CrashPingsSummary } from '../types/summary';
import { clampCount, percentage } from '../utils/fields';

export const CRASH_PING_FACETS = [
  'signature',
  'channel',
  'os',
  'process',
  'version',
  'arch',
  'osversion',
  'build_id',
  'ipc_actor',
  'reason',
  'type'
] as const;

export type CrashPingFacet = (typeof CRASH_PING_FACETS)[number];

export interface CrashPingFilters {
  channel?: string | undefined;
  os?: string | undefined;
  process?: string | undefined;
  version?: string | undefined;
  // Exact match, or case-insensitive substring with a leading "~"
  signature?: string | undefined;
  arch?: string | undefined;
}

const NONE_LABEL = '(none)';

export function isCrashPingFacet(facet: string): facet is CrashPingFacet {
  return CRASH_PING_FACETS.some(f => f === facet);
}

function columnValue(column: IndexedStrings | NullableIndexedStrings, row: number): string | undefined {
  const position = column.values[row];
  if (position === undefined) return undefined;
  return column.strings[position] ?? undefined;
}

function equalsIgnoreCase(value: string | undefined, expected: string): boolean {
  return value !== undefined && value.toLowerCase() === expected.toLowerCase();
}

function matchesSignature(signature: string | undefined, pattern: string): boolean {
  if (signature === undefined) return false;
  if (pattern.startsWith('~')) {
    return signature.toLowerCase().includes(pattern.slice(1).toLowerCase());
  }
  return signature === pattern;
}

export function matchesFilters(raw: RawCrashPings, row: number, filters: CrashPingFilters): boolean {
  if (filters.channel !== undefined && !equalsIgnoreCase(columnValue(raw.channel, row), filters.channel)) return false;
  if (filters.os !== undefined && !equalsIgnoreCase(columnValue(raw.os, row), filters.os)) return false;
  if (filters.process !== undefined && !equalsIgnoreCase(columnValue(raw.process, row), filters.process)) return false;
  if (filters.version !== undefined && columnValue(raw.version, row) !== filters.version) return false;
  if (filters.signature !== undefined && !matchesSignature(columnValue(raw.signature, row), filters.signature)) {
    return false;
  }
  if (filters.arch !== undefined && !equalsIgnoreCase(columnValue(raw.arch, row), filters.arch)) return false;
  return true;
}

function compareItems(a: CrashPingsItem, b: CrashPingsItem): number {
  if (a.count !== b.count) return b.count - a.count;
  if (a.label < b.label) return -1;
  if (a.label > b.label) return 1;
  return 0;
}

export function normalizeCrashPings(
  raw: RawCrashPings,
  filters: CrashPingFilters,
  facet: CrashPingFacet,
  limit: number,
  date: string
): CrashPingsSummary {
  const counts = new Map<string, number>();
  let filteredTotal = 0;

  for (let row = 0; row < raw.crashid.length; row++) {
    if (!matchesFilters(raw, row, filters)) continue;
    filteredTotal++;
    const label = columnValue(raw[facet], row) ?? NONE_LABEL;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  const items = [...counts.entries()]
    .map(([label, count]) => ({ label, count, percentage: percentage(count, filteredTotal) }))
    .sort(compareItems)
    .slice(0, clampCount(limit));

  const summary: CrashPingsSummary = {
    kind: 'crashPings',
    date,
    facet,
    total: raw.crashid.length,
    filteredTotal,
    items
  };
  if (filters.signature !== undefined) {
    summary.signatureFilter = filters.signature;
  }
  return summary;
}
