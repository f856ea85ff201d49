import type {
  CorrelationSummary,
  CrashPingStackSummary,
  CrashPingsSummary,
  CrashSummary,
  SearchResultSet,
  SearchRow,
  Summary,
  ThreadSummary
} from '../types/summary';
import { formatFrame, formatJavaException, formatPercentage, isNullAddress, joinPresent } from './shared';

// Token-efficient plain text. Absent fields are skipped, never printed empty.

function hasAny(...values: (string | undefined)[]): boolean {
  return values.some(v => v !== undefined);
}

function formatReason(summary: CrashSummary): string | undefined {
  const { reason, address } = summary;
  const nullNote = address !== undefined && isNullAddress(address) ? ' (null ptr)' : '';
  if (reason === undefined) {
    return address !== undefined ? `address: ${address}${nullNote}` : undefined;
  }
  if (address === undefined || address === '') return `reason: ${reason}`;
  return `reason: ${reason} @ ${address}${nullNote}`;
}

function formatPlatform(summary: CrashSummary): string | undefined {
  const { osName, osVersion, androidModel, androidVersion } = summary;
  if (!hasAny(osName, osVersion, androidModel, androidVersion)) return undefined;
  const os = joinPresent([osName, osVersion]);
  const device = joinPresent([androidModel, androidVersion]);
  return `platform: ${joinPresent([os, device], ', ')}`;
}

function formatThread(thread: ThreadSummary): string[] {
  const marker = thread.crashing ? ' [CRASHING]' : '';
  return [`stack[${thread.label}]${marker}:`, ...thread.frames.map(f => `  ${formatFrame(f)}`)];
}

export function formatCrash(summary: CrashSummary): string {
  const lines: string[] = [`CRASH ${summary.crashId}`];
  const optional: (string | undefined)[] = [
    summary.signature !== undefined ? `sig: ${summary.signature}` : undefined,
    formatReason(summary),
    summary.crashReason !== undefined ? `moz_reason: ${summary.crashReason}` : undefined,
    summary.abortMessage !== undefined ? `abort: ${summary.abortMessage}` : undefined,
    hasAny(summary.product, summary.version)
      ? `product: ${joinPresent([summary.product, summary.version])}`
      : undefined,
    formatPlatform(summary),
    summary.buildId !== undefined ? `build: ${summary.buildId}` : undefined,
    summary.releaseChannel !== undefined ? `channel: ${summary.releaseChannel}` : undefined
  ];
  lines.push(...optional.filter((l): l is string => l !== undefined));

  for (const thread of summary.threads) {
    lines.push('', ...formatThread(thread));
  }

  return `${lines.join('\n')}\n`;
}

const EMPTY_CELL = '-';

// Columns keep fixed positions; absent cells print as "-"
function formatRow(row: SearchRow): string {
  const platform = joinPresent([row.platform, row.platformVersion]);
  const product = joinPresent([row.product, row.version]);
  return [row.crashId, row.date, product, platform, row.releaseChannel, row.buildId, row.signature]
    .map(cell => (cell === undefined || cell === '' ? EMPTY_CELL : cell))
    .join(' | ');
}

export function formatSearch(result: SearchResultSet): string {
  const lines: string[] = [`FOUND ${result.total} crashes`];

  if (result.rows.length > 0) {
    lines.push('', ...result.rows.map(formatRow));
  }

  const fields = Object.keys(result.facets);
  if (fields.length > 0) {
    lines.push('', 'AGGREGATIONS:');
    for (const field of fields) {
      const buckets = result.facets[field] ?? [];
      lines.push('', `${field}:`, ...buckets.map(b => `  ${b.term} (${b.count})`));
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatCorrelations(summary: CorrelationSummary): string {
  const lines: string[] = [
    `CORRELATIONS ${summary.signature}`,
    `channel: ${summary.channel} date: ${summary.date}`,
    `sig_count: ${summary.groupTotal} ref_count: ${summary.referenceTotal}`
  ];

  for (const group of summary.groups) {
    lines.push('', `${group.attribute}:`);
    for (const item of group.items) {
      lines.push(`  ${formatPercentage(item.groupPercentage)} vs ${formatPercentage(item.referencePercentage)} ${item.value}`);
      if (item.prior) {
        const { prior } = item;
        lines.push(
          `    prior ${prior.label}: ${formatPercentage(prior.groupPercentage)} vs ${formatPercentage(prior.referencePercentage)}`
        );
      }
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatCrashPings(summary: CrashPingsSummary): string {
  const lines: string[] = [`CRASH PINGS ${summary.date}`];
  if (summary.signatureFilter !== undefined) {
    lines.push(`sig: ${summary.signatureFilter}`);
  }
  lines.push(`total: ${summary.total} matched: ${summary.filteredTotal}`);

  if (summary.items.length > 0) {
    lines.push('', `${summary.facet}:`);
    lines.push(...summary.items.map(i => `  ${i.count} (${formatPercentage(i.percentage)}) ${i.label}`));
  }

  return `${lines.join('\n')}\n`;
}

export function formatCrashPingStack(summary: CrashPingStackSummary): string {
  const lines: string[] = [`CRASH PING ${summary.crashId}`, `date: ${summary.date}`];

  if (summary.frames.length > 0) {
    lines.push('', 'stack:', ...summary.frames.map(f => `  ${formatFrame(f)}`));
  }
  if (summary.javaException !== undefined) {
    lines.push('', 'java_exception:', formatJavaException(summary.javaException));
  }

  return `${lines.join('\n')}\n`;
}

export function renderCompact(summary: Summary): string {
  switch (summary.kind) {
    case 'crash':
      return formatCrash(summary);
    case 'search':
      return formatSearch(summary);
    case 'correlations':
      return formatCorrelations(summary);
    case 'crashPings':
      return formatCrashPings(summary);
    case 'crashPingStack':
      return formatCrashPingStack(summary);
  }
}
