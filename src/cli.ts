#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

const log = createLogger('cli');

const CLI_NAME = 'wirecall';
const CLI_DESCRIPTION = 'Call JSON-RPC methods over HTTP-framed or raw sockets, with optional TLS';

/**
 * Main entry point.
 *
 * 1. Enable debug logging early when --debug is present
 * 2. Initialize Commander and register command handlers
 * 3. Parse arguments and route to the command
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }
  log.debug(`${CLI_NAME} ${VERSION} on Node.js ${process.version}`);

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  try {
    await program.parseAsync();
  } catch (error: unknown) {
    log.info(getErrorMessage(error));
    process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
  }
}

void main();
