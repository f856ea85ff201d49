import { readToken } from '../auth/token';
import { CorrelationsClient } from '../client/correlationsClient';
import { CrashPingsClient } from '../client/crashPingsClient';
import { CrashStatsClient } from '../client/crashStatsClient';
import type { FetchLike } from '../client/http';
import { USAGE, type Command } from '../cli/parser';
import type { AppConfig } from '../config/config';
import type { OutputFormat } from '../renderers';
import { runCorrelations } from './correlations';
import { runCrash } from './crash';
import { runCrashPings } from './crashPings';
import { runSearch } from './search';

export interface CommandContext {
  config: AppConfig;
  fetch?: FetchLike | undefined;
  now?: Date | undefined;
}

export async function executeCommand(command: Command, format: OutputFormat, context: CommandContext): Promise<string> {
  const { config, fetch } = context;

  switch (command.name) {
    case 'help':
      return USAGE;

    case 'crash': {
      const client = new CrashStatsClient({
        baseUrl: config.apiBaseUrl,
        token: readToken(config.tokenPath),
        fetch
      });
      return runCrash(client, { ...command, format });
    }

    case 'search': {
      const client = new CrashStatsClient({
        baseUrl: config.apiBaseUrl,
        token: readToken(config.tokenPath),
        fetch
      });
      return runSearch(client, command.params, format, context.now);
    }

    case 'correlations': {
      const client = new CorrelationsClient({ baseUrl: config.correlationsBaseUrl, fetch });
      return runCorrelations(client, { signature: command.signature, channel: command.channel, format });
    }

    case 'crash-pings': {
      const client = new CrashPingsClient({ baseUrl: config.crashPingsBaseUrl, fetch });
      return runCrashPings(
        client,
        {
          date: command.date,
          filters: command.filters,
          facet: command.facet,
          limit: command.limit,
          stack: command.stack,
          format
        },
        context.now
      );
    }
  }
}
