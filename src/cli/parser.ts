import type { SearchParams } from '../client/crashStatsClient';
import { UsageError } from '../client/errors';
import type { CrashPingFilters } from '../normalizers/crashPingsNormalizer';
import { OutputFormat, parseOutputFormat } from '../renderers';

export type Command =
  | { name: 'help' }
  | { name: 'crash'; target: string; depth: number; allThreads: boolean }
  | { name: 'search'; params: SearchParams }
  | { name: 'correlations'; signature: string; channel: string }
  | {
      name: 'crash-pings';
      date?: string | undefined;
      filters: CrashPingFilters;
      facet: string;
      limit: number;
      stack?: string | undefined;
    };

export interface CliArgs {
  format: OutputFormat;
  command: Command;
}

export const USAGE = `Usage: crashstats [--format compact|json|markdown] <command> [options]

Commands:
  crash <crash-id|url>      Show a processed crash report
    --depth N               Frames kept per thread (default 10)
    --all-threads           Show every thread, not only the crashing one

  search                    Search crash reports
    --signature S           Exact signature
    --product P             Product (default Firefox)
    --version V             Version
    --platform P            Platform, e.g. Windows, Linux, Mac OS X
    --cpu-arch A            CPU architecture
    --channel C             Release channel
    --platform-version V    Platform version
    --process-type T        Process type
    --days N                Look back N days (default 7)
    --limit N               Rows to show (default 10, or 0 with --facet)
    --facet F               Aggregate on a field (repeatable)
    --facets-size N         Buckets kept per facet
    --sort S                Sort order (default -date)

  correlations              Show attributes correlated with a signature
    --signature S           Signature (required)
    --channel C             release, beta, nightly or esr (default release)

  crash-pings               Aggregate one day of crash pings
    --date YYYY-MM-DD       Day to fetch (default yesterday, UTC)
    --channel C             Channel filter
    --os O                  OS filter
    --process P             Process filter
    --version V             Version filter
    --signature S           Signature filter; prefix with ~ for a substring match
    --arch A                Architecture filter
    --facet F               Field to aggregate on (default signature)
    --limit N               Items to show (default 10)
    --stack ID              Show the symbolicated stack of one crash ping instead

Environment:
  SOCORRO_API_TOKEN_PATH    File holding an API token with no permissions
  CRASHSTATS_API_URL        Override the crash reporting API base URL
`;

// Flags that never take a value
const SWITCHES = new Set(['all-threads', 'help']);

const COMMAND_FLAGS: Record<Exclude<Command['name'], 'help'>, string[]> = {
  crash: ['depth', 'all-threads'],
  search: [
    'signature',
    'product',
    'version',
    'platform',
    'cpu-arch',
    'channel',
    'platform-version',
    'process-type',
    'days',
    'limit',
    'facet',
    'facets-size',
    'sort'
  ],
  correlations: ['signature', 'channel'],
  'crash-pings': ['date', 'channel', 'os', 'process', 'version', 'signature', 'arch', 'facet', 'limit', 'stack']
};

const GLOBAL_FLAGS = ['format', 'help'];

interface Tokens {
  positionals: string[];
  values: Map<string, string[]>;
  switches: Set<string>;
}

function tokenize(args: string[]): Tokens {
  const tokens: Tokens = { positionals: [], values: new Map(), switches: new Set() };
  let i = 0;

  while (i < args.length) {
    const arg = args[i] ?? '';

    if (arg === '-h') {
      tokens.switches.add('help');
      i++;
      continue;
    }

    if (!arg.startsWith('--')) {
      tokens.positionals.push(arg);
      i++;
      continue;
    }

    // Handle --flag=value
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (SWITCHES.has(name)) {
      if (eq !== -1) throw new UsageError(`Option --${name} does not take a value`);
      tokens.switches.add(name);
      i++;
      continue;
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
      i++;
    } else {
      // Handle --flag value
      value = args[i + 1];
      i += 2;
    }
    if (value === undefined) {
      throw new UsageError(`Missing value for --${name}`);
    }

    const existing = tokens.values.get(name);
    if (existing) {
      existing.push(value);
    } else {
      tokens.values.set(name, [value]);
    }
  }

  return tokens;
}

function last(tokens: Tokens, name: string): string | undefined {
  const values = tokens.values.get(name);
  return values?.[values.length - 1];
}

function parseCount(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

function optionalCount(name: string, value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseCount(name, value, 0);
}

function checkFlags(command: string, tokens: Tokens, allowed: string[]): void {
  const known = new Set([...GLOBAL_FLAGS, ...allowed]);
  for (const name of [...tokens.values.keys(), ...tokens.switches]) {
    if (!known.has(name)) {
      throw new UsageError(`Unknown option --${name} for ${command}`);
    }
  }
}

function isCommandName(name: string): name is keyof typeof COMMAND_FLAGS {
  return Object.keys(COMMAND_FLAGS).includes(name);
}

function buildCommand(name: keyof typeof COMMAND_FLAGS, operands: string[], tokens: Tokens): Command {
  switch (name) {
    case 'crash': {
      const target = operands[0];
      if (target === undefined || operands.length > 1) {
        throw new UsageError('crash takes exactly one crash ID or report URL');
      }
      return {
        name,
        target,
        depth: parseCount('depth', last(tokens, 'depth'), 10),
        allThreads: tokens.switches.has('all-threads')
      };
    }

    case 'search': {
      const facets = tokens.values.get('facet') ?? [];
      return {
        name,
        params: {
          signature: last(tokens, 'signature'),
          product: last(tokens, 'product') ?? 'Firefox',
          version: last(tokens, 'version'),
          platform: last(tokens, 'platform'),
          cpuArch: last(tokens, 'cpu-arch'),
          releaseChannel: last(tokens, 'channel'),
          platformVersion: last(tokens, 'platform-version'),
          processType: last(tokens, 'process-type'),
          days: parseCount('days', last(tokens, 'days'), 7),
          // Aggregation-only queries skip the rows unless asked for
          limit: parseCount('limit', last(tokens, 'limit'), facets.length > 0 ? 0 : 10),
          facets,
          facetsSize: optionalCount('facets-size', last(tokens, 'facets-size')),
          sort: last(tokens, 'sort') ?? '-date'
        }
      };
    }

    case 'correlations': {
      const signature = last(tokens, 'signature');
      if (signature === undefined) {
        throw new UsageError('correlations requires --signature');
      }
      return { name, signature, channel: last(tokens, 'channel') ?? 'release' };
    }

    case 'crash-pings':
      return {
        name,
        date: last(tokens, 'date'),
        filters: {
          channel: last(tokens, 'channel'),
          os: last(tokens, 'os'),
          process: last(tokens, 'process'),
          version: last(tokens, 'version'),
          signature: last(tokens, 'signature'),
          arch: last(tokens, 'arch')
        },
        facet: last(tokens, 'facet') ?? 'signature',
        limit: parseCount('limit', last(tokens, 'limit'), 10),
        stack: last(tokens, 'stack')
      };
  }
}

export function parseArgs(args: string[]): CliArgs {
  const tokens = tokenize(args);

  const formatValue = last(tokens, 'format');
  let format = OutputFormat.COMPACT;
  if (formatValue !== undefined) {
    const parsed = parseOutputFormat(formatValue);
    if (parsed === undefined) {
      throw new UsageError(`Unknown format "${formatValue}". Expected one of: ${Object.values(OutputFormat).join(', ')}`);
    }
    format = parsed;
  }

  const [name, ...operands] = tokens.positionals;
  if (tokens.switches.has('help') || name === undefined) {
    return { format, command: { name: 'help' } };
  }
  if (!isCommandName(name)) {
    throw new UsageError(`Unknown command "${name}". Run crashstats --help for usage`);
  }

  checkFlags(name, tokens, COMMAND_FLAGS[name]);
  if (name !== 'crash' && operands.length > 0) {
    throw new UsageError(`Unexpected argument "${operands[0]}" for ${name}`);
  }

  return { format, command: buildCommand(name, operands, tokens) };
}
