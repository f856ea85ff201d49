import type { RawCrashHit, RawFacetBucket, RawSearchResponse } from '../types/raw';
import type { FacetBucket, SearchResultSet, SearchRow } from '../types/summary';
import { assignPresent, clampCount } from '../utils/fields';

function mapRow(hit: RawCrashHit): SearchRow {
  const row: SearchRow = { crashId: hit.uuid };
  assignPresent(row, 'date', hit.date);
  assignPresent(row, 'signature', hit.signature);
  assignPresent(row, 'product', hit.product);
  assignPresent(row, 'version', hit.version);
  assignPresent(row, 'platform', hit.platform);
  assignPresent(row, 'platformVersion', hit.platform_version);
  assignPresent(row, 'buildId', hit.build_id);
  assignPresent(row, 'releaseChannel', hit.release_channel);
  return row;
}

function mapBucket(bucket: RawFacetBucket): FacetBucket {
  return { term: bucket.term, count: bucket.count };
}

// Upstream order is kept for both hits and buckets; sorting is a request parameter
export function normalizeSearch(
  raw: RawSearchResponse,
  requestedLimit: number,
  facetFields: string[],
  facetsSize?: number
): SearchResultSet {
  const rows = raw.hits.slice(0, clampCount(requestedLimit)).map(mapRow);

  // Field names come from the user; only own keys count, so "constructor" or
  // "__proto__" behave like any other missing facet
  const facets: Record<string, FacetBucket[]> = Object.fromEntries(
    facetFields.map((field): [string, FacetBucket[]] => {
      const buckets = (Object.hasOwn(raw.facets, field) ? raw.facets[field] : undefined) ?? [];
      const kept = facetsSize === undefined ? buckets : buckets.slice(0, clampCount(facetsSize));
      return [field, kept.map(mapBucket)];
    })
  );

  return {
    kind: 'search',
    total: raw.total,
    rows,
    facets
  };
}
