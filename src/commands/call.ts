import type { Command } from 'commander';

import { RpcClient } from '@/client/index.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  addConnectionOptions,
  toClientOptions,
  type ConnectionCommandOptions,
} from '@/commands/shared/commonOptions.js';
import { parseParams } from '@/commands/shared/params.js';

/**
 * Options for the `wirecall call` command.
 */
interface CallOptions extends ConnectionCommandOptions {
  /** Treat params as key=value pairs */
  named?: boolean;
}

/**
 * Format a call result for humans: strings as-is, everything else as JSON.
 */
export function formatResult(result: unknown): string {
  return typeof result === 'string' ? result : JSON.stringify(result, null, 2);
}

/**
 * Register call command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerCallCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('call')
      .description('Call a remote method and print its result')
      .argument('<method>', 'Remote method name')
      .argument('[params...]', 'Arguments: JSON values, anything else is sent as a string')
      .option('--named', 'Send params as an object of key=value pairs')
  ).action(async (method: string, params: string[], options: CallOptions) => {
    await runCommand(
      async (opts) => {
        const callParams = parseParams(params, opts.named);
        const client = new RpcClient(toClientOptions(opts));
        try {
          const response = await client.invoke(method, callParams);
          return { success: true, data: response.json };
        } finally {
          await client.close();
        }
      },
      options,
      formatResult
    );
  });
}
