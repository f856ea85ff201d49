// Curated, display-ready views built from raw payloads.
// Optional fields are absent keys when the source has no value; an empty
// string here means the source really sent an empty string.

export interface StackFrame {
  index: number;
  // Function name, or "offset (module)" / "???" when unsymbolicated
  function: string;
  file?: string;
  line?: number;
  module?: string;
  offset?: string;
}

export interface ThreadSummary {
  index: number;
  label: string;
  name?: string;
  crashing: boolean;
  frames: StackFrame[];
}

export type CrashingThread = number | 'unknown';

export interface CrashSummary {
  kind: 'crash';
  crashId: string;
  signature?: string;
  reason?: string;
  address?: string;
  crashReason?: string;
  abortMessage?: string;
  product?: string;
  version?: string;
  buildId?: string;
  releaseChannel?: string;
  osName?: string;
  osVersion?: string;
  androidModel?: string;
  androidVersion?: string;
  crashingThread: CrashingThread;
  allThreads: boolean;
  threads: ThreadSummary[];
}

export interface SearchRow {
  crashId: string;
  date?: string;
  signature?: string;
  product?: string;
  version?: string;
  platform?: string;
  platformVersion?: string;
  buildId?: string;
  releaseChannel?: string;
}

export interface FacetBucket {
  term: string;
  count: number;
}

export interface SearchResultSet {
  kind: 'search';
  total: number;
  rows: SearchRow[];
  facets: Record<string, FacetBucket[]>;
}

export interface CorrelationPrior {
  label: string;
  groupPercentage: number;
  referencePercentage: number;
}

export interface CorrelationItem {
  value: string;
  label: string;
  groupCount: number;
  referenceCount: number;
  groupPercentage: number;
  referencePercentage: number;
  prior?: CorrelationPrior;
}

export interface CorrelationGroup {
  attribute: string;
  items: CorrelationItem[];
}

export interface CorrelationSummary {
  kind: 'correlations';
  signature: string;
  channel: string;
  date: string;
  groupTotal: number;
  referenceTotal: number;
  groups: CorrelationGroup[];
}

export interface CrashPingsItem {
  label: string;
  count: number;
  percentage: number;
}

export interface CrashPingsSummary {
  kind: 'crashPings';
  date: string;
  facet: string;
  signatureFilter?: string;
  total: number;
  filteredTotal: number;
  items: CrashPingsItem[];
}

export interface CrashPingStackSummary {
  kind: 'crashPingStack';
  crashId: string;
  date: string;
  frames: StackFrame[];
  // Passed through as sent; present only for Java crashes
  javaException?: unknown;
}

export type Summary =
  | CrashSummary
  | SearchResultSet
  | CorrelationSummary
  | CrashPingsSummary
  | CrashPingStackSummary;
