#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs } from './cli/parser';
import { UpstreamError, UsageError, errorMessage } from './client/errors';
import { executeCommand } from './commands';
import { getConfig } from './config/config';

dotenv.config();

const logger = getLogger();

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = getConfig();

  logger.debug(`Running ${args.command.name} (${args.format})`);
  const output = await executeCommand(args.command, args.format, { config });
  process.stdout.write(output);
}

main().catch((e: unknown) => {
  if (e instanceof UpstreamError || e instanceof UsageError) {
    logger.error(e.message);
    process.exitCode = 1;
    return;
  }
  logger.error(`Unexpected error: ${errorMessage(e)}`);
  process.exitCode = 2;
});
