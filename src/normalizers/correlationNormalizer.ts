import type { RawCorrelationPrior, RawCorrelationResponse, RawCorrelationResult, RawCorrelationTotals } from '../types/raw';
import type { CorrelationGroup, CorrelationItem, CorrelationPrior, CorrelationSummary } from '../types/summary';
import { percentage } from '../utils/fields';

export const CORRELATION_CHANNELS = ['release', 'beta', 'nightly', 'esr'] as const;

export type CorrelationChannel = (typeof CORRELATION_CHANNELS)[number];

export interface CorrelationScope {
  signature: string;
  channel: string;
}

// Joins the parts of a multi-attribute item, e.g. `a = 1 ∧ b = true`
const CONJUNCTION = ' ∧ ';

export function isCorrelationChannel(channel: string): channel is CorrelationChannel {
  return CORRELATION_CHANNELS.some(c => c === channel);
}

export function referenceTotalFor(totals: RawCorrelationTotals, channel: string): number | undefined {
  if (!isCorrelationChannel(channel)) return undefined;
  return totals[channel];
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

interface ItemParts {
  attribute: string;
  value: string;
  label: string;
}

// Keys are sorted so the same attribute set always yields the same group name
export function describeItem(item: Record<string, unknown>): ItemParts {
  const keys = Object.keys(item).sort();
  const values = keys.map(k => formatValue(item[k]));
  return {
    attribute: keys.join(CONJUNCTION),
    value: values.join(CONJUNCTION),
    label: keys.map((k, i) => `${k} = ${values[i]}`).join(CONJUNCTION)
  };
}

function mapPrior(prior: RawCorrelationPrior): CorrelationPrior {
  return {
    label: describeItem(prior.item).label,
    groupPercentage: percentage(prior.count_group, prior.total_group),
    referencePercentage: percentage(prior.count_reference, prior.total_reference)
  };
}

function mapItem(
  result: RawCorrelationResult,
  groupTotal: number,
  referenceTotal: number
): { attribute: string; item: CorrelationItem } {
  const { attribute, value, label } = describeItem(result.item);
  const item: CorrelationItem = {
    value,
    label,
    groupCount: result.count_group,
    referenceCount: result.count_reference,
    groupPercentage: percentage(result.count_group, groupTotal),
    referencePercentage: percentage(result.count_reference, referenceTotal)
  };
  if (result.prior) {
    item.prior = mapPrior(result.prior);
  }
  return { attribute, item };
}

function compareItems(a: CorrelationItem, b: CorrelationItem): number {
  if (a.groupCount !== b.groupCount) return b.groupCount - a.groupCount;
  if (a.value < b.value) return -1;
  if (a.value > b.value) return 1;
  return 0;
}

export function normalizeCorrelations(
  totals: RawCorrelationTotals,
  response: RawCorrelationResponse,
  scope: CorrelationScope
): CorrelationSummary {
  const referenceTotal = referenceTotalFor(totals, scope.channel) ?? 0;

  // Map keeps attributes in the order they were first received
  const grouped = new Map<string, CorrelationItem[]>();
  for (const result of response.results) {
    const { attribute, item } = mapItem(result, response.total, referenceTotal);
    const items = grouped.get(attribute);
    if (items) {
      items.push(item);
    } else {
      grouped.set(attribute, [item]);
    }
  }

  const groups: CorrelationGroup[] = [...grouped.entries()].map(([attribute, items]) => ({
    attribute,
    items: [...items].sort(compareItems)
  }));

  return {
    kind: 'correlations',
    signature: scope.signature,
    channel: scope.channel,
    date: totals.date,
    groupTotal: response.total,
    referenceTotal,
    groups
  };
}
