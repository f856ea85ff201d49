import { getLogger } from '@fluidware-it/saddlebag';
import type { CorrelationsClient } from '../client/correlationsClient';
import { UsageError } from '../client/errors';
import {
  CORRELATION_CHANNELS,
  isCorrelationChannel,
  normalizeCorrelations
} from '../normalizers/correlationNormalizer';
import { render, type OutputFormat } from '../renderers';

export interface CorrelationsCommandOptions {
  signature: string;
  channel: string;
  format: OutputFormat;
}

export async function runCorrelations(
  client: Pick<CorrelationsClient, 'getTotals' | 'getCorrelations'>,
  options: CorrelationsCommandOptions
): Promise<string> {
  const { signature, channel } = options;
  if (!isCorrelationChannel(channel)) {
    throw new UsageError(`Unknown channel "${channel}". Expected one of: ${CORRELATION_CHANNELS.join(', ')}`);
  }
  if (signature.trim() === '') {
    throw new UsageError('A signature is required');
  }

  getLogger().debug(`Fetching ${channel} correlations for ${signature}`);
  const totals = await client.getTotals();
  const response = await client.getCorrelations(signature, channel);

  const summary = normalizeCorrelations(totals, response, { signature, channel });
  return render(options.format, summary);
}
