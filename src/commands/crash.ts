import { getLogger } from '@fluidware-it/saddlebag';
import type { CrashStatsClient } from '../client/crashStatsClient';
import { UsageError } from '../client/errors';
import { normalizeCrash } from '../normalizers/crashNormalizer';
import { render, type OutputFormat } from '../renderers';

export interface CrashCommandOptions {
  // A crash ID or a report URL ending in one
  target: string;
  depth: number;
  allThreads: boolean;
  format: OutputFormat;
}

const CRASH_ID_PATTERN = /^[0-9a-fA-F-]+$/;

export function extractCrashId(target: string): string {
  let candidate = target.trim();
  if (/^https?:\/\//i.test(candidate)) {
    let pathname: string;
    try {
      pathname = new URL(candidate).pathname;
    } catch {
      throw new UsageError(`Invalid crash report URL: ${target}`);
    }
    candidate = pathname.split('/').filter(segment => segment !== '').pop() ?? '';
  }

  if (!CRASH_ID_PATTERN.test(candidate)) {
    throw new UsageError(`Invalid crash ID "${candidate}": expected hexadecimal digits and dashes`);
  }
  return candidate;
}

export async function runCrash(client: Pick<CrashStatsClient, 'getCrash'>, options: CrashCommandOptions): Promise<string> {
  const crashId = extractCrashId(options.target);
  getLogger().debug(`Fetching crash ${crashId}`);

  const raw = await client.getCrash(crashId);
  const summary = normalizeCrash(raw, options.depth, options.allThreads);
  return render(options.format, summary);
}
