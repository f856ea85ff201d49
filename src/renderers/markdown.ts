import type {
  CorrelationItem,
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

// Pipes would otherwise split a table cell; signatures like "OOM | small" contain them
function cell(value: string | undefined): string {
  return (value ?? '').replace(/\|/g, '\\|');
}

function tableRow(cells: (string | undefined)[]): string {
  return `| ${cells.map(cell).join(' | ')} |`;
}

function tableHeader(titles: string[]): string[] {
  return [tableRow(titles), `|${titles.map(() => '---').join('|')}|`];
}

function formatCodeBlock(thread: ThreadSummary): string[] {
  return ['```', ...thread.frames.map(formatFrame), '```'];
}

function crashDetails(summary: CrashSummary): string[] {
  const details: string[] = [];

  if (summary.reason !== undefined) {
    const { address } = summary;
    if (address === undefined || address === '') {
      details.push(`- **Crash Reason:** ${summary.reason}`);
    } else {
      const nullNote = isNullAddress(address) ? ' (null pointer)' : '';
      details.push(`- **Crash Reason:** ${summary.reason} at \`${address}\`${nullNote}`);
    }
  } else if (summary.address !== undefined) {
    const nullNote = isNullAddress(summary.address) ? ' (null pointer)' : '';
    details.push(`- **Crash Address:** \`${summary.address}\`${nullNote}`);
  }
  if (summary.crashReason !== undefined) {
    details.push(`- **Crash Reason Message:** ${summary.crashReason}`);
  }
  if (summary.abortMessage !== undefined) {
    details.push(`- **Abort Message:** ${summary.abortMessage}`);
  }
  if (summary.product !== undefined || summary.version !== undefined) {
    details.push(`- **Product:** ${joinPresent([summary.product, summary.version])}`);
  }

  const { osName, osVersion, androidModel, androidVersion } = summary;
  if ([osName, osVersion, androidModel, androidVersion].some(v => v !== undefined)) {
    const device = joinPresent([androidModel, androidVersion]);
    const os = joinPresent([osName, osVersion]);
    details.push(`- **Platform:** ${joinPresent([os, device !== '' ? `on ${device}` : undefined])}`);
  }
  if (summary.buildId !== undefined) {
    details.push(`- **Build ID:** ${summary.buildId}`);
  }
  if (summary.releaseChannel !== undefined) {
    details.push(`- **Release Channel:** ${summary.releaseChannel}`);
  }

  return details;
}

export function formatCrash(summary: CrashSummary): string {
  const lines: string[] = ['# Crash Report', '', `**Crash ID:** \`${summary.crashId}\``];
  if (summary.signature !== undefined) {
    lines.push('', `**Signature:** \`${summary.signature}\``);
  }

  const details = crashDetails(summary);
  if (details.length > 0) {
    lines.push('', '## Details', '', ...details);
  }

  if (summary.allThreads) {
    if (summary.threads.length > 0) {
      lines.push('', '## All Threads');
    }
    for (const thread of summary.threads) {
      const marker = thread.crashing ? ' **[CRASHING]**' : '';
      lines.push('', `### ${thread.label}${marker}`, '', ...formatCodeBlock(thread));
    }
  } else {
    for (const thread of summary.threads) {
      lines.push('', `## Stack Trace (${thread.label})`, '', ...formatCodeBlock(thread));
    }
  }

  return `${lines.join('\n')}\n`;
}

function searchRow(row: SearchRow): string {
  return tableRow([
    row.crashId,
    row.date,
    row.product,
    row.version,
    joinPresent([row.platform, row.platformVersion]),
    row.releaseChannel,
    row.buildId,
    row.signature
  ]);
}

export function formatSearch(result: SearchResultSet): string {
  const lines: string[] = ['# Search Results', '', `Found **${result.total}** crashes`];

  if (result.rows.length > 0) {
    lines.push(
      '',
      '## Crashes',
      '',
      ...tableHeader(['Crash ID', 'Date', 'Product', 'Version', 'Platform', 'Channel', 'Build ID', 'Signature']),
      ...result.rows.map(searchRow)
    );
  }

  const fields = Object.keys(result.facets);
  if (fields.length > 0) {
    lines.push('', '## Aggregations');
    for (const field of fields) {
      const buckets = result.facets[field] ?? [];
      lines.push('', `### ${field}`, '');
      if (buckets.length === 0) {
        lines.push('_No results_');
      } else {
        lines.push(...buckets.map(b => `- **${b.term}**: ${b.count} crashes`));
      }
    }
  }

  return `${lines.join('\n')}\n`;
}

function correlationRow(item: CorrelationItem): string {
  const prior = item.prior
    ? `${item.prior.label}: ${formatPercentage(item.prior.groupPercentage)} vs ${formatPercentage(item.prior.referencePercentage)}`
    : undefined;
  return tableRow([formatPercentage(item.groupPercentage), formatPercentage(item.referencePercentage), item.value, prior]);
}

export function formatCorrelations(summary: CorrelationSummary): string {
  const lines: string[] = [
    `# Correlations: \`${summary.signature}\``,
    '',
    `- **Channel:** ${summary.channel}`,
    `- **Date:** ${summary.date}`,
    `- **Signature crashes:** ${summary.groupTotal}`,
    `- **Reference crashes:** ${summary.referenceTotal}`
  ];

  for (const group of summary.groups) {
    lines.push(
      '',
      `## ${group.attribute}`,
      '',
      ...tableHeader(['Signature %', 'Reference %', 'Value', 'Prior']),
      ...group.items.map(correlationRow)
    );
  }

  return `${lines.join('\n')}\n`;
}

export function formatCrashPings(summary: CrashPingsSummary): string {
  const lines: string[] = [`# Crash Pings: ${summary.date}`, ''];
  if (summary.signatureFilter !== undefined) {
    lines.push(`- **Signature filter:** \`${summary.signatureFilter}\``);
  }
  lines.push(`- **Total pings:** ${summary.total}`, `- **Matching pings:** ${summary.filteredTotal}`);

  if (summary.items.length > 0) {
    lines.push(
      '',
      `## Top ${summary.facet}`,
      '',
      ...tableHeader(['Count', 'Share', summary.facet]),
      ...summary.items.map(i => tableRow([String(i.count), formatPercentage(i.percentage), i.label]))
    );
  }

  return `${lines.join('\n')}\n`;
}

export function formatCrashPingStack(summary: CrashPingStackSummary): string {
  const lines: string[] = [
    '# Crash Ping Stack',
    '',
    `**Crash ID:** \`${summary.crashId}\``,
    '',
    `- **Date:** ${summary.date}`
  ];

  if (summary.frames.length > 0) {
    lines.push('', '## Stack Trace', '', '```', ...summary.frames.map(formatFrame), '```');
  }
  if (summary.javaException !== undefined) {
    lines.push('', '## Java Exception', '', '```', formatJavaException(summary.javaException), '```');
  }

  return `${lines.join('\n')}\n`;
}

export function renderMarkdown(summary: Summary): string {
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
