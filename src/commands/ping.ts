import { performance } from 'node:perf_hooks';

import { InvalidArgumentError } from 'commander';

import type { Command } from 'commander';

import { RpcClient } from '@/client/index.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  addConnectionOptions,
  toClientOptions,
  type ConnectionCommandOptions,
} from '@/commands/shared/commonOptions.js';

/**
 * Options for the `wirecall ping` command.
 */
interface PingOptions extends ConnectionCommandOptions {
  /** Number of connections to open one after another */
  count: number;
}

export interface PingAttempt {
  connection: number;
  connectMs: number;
  sessionReused: boolean;
}

export interface PingReport {
  host: string;
  port: number;
  mode: 'http' | 'raw';
  tls: boolean;
  attempts: PingAttempt[];
}

/**
 * Open and close `count` connections in turn.
 *
 * The TLS session is kept between attempts, so from the second attempt on a
 * TLS server that supports resumption reports `sessionReused: true`.
 */
export async function pingServer(client: RpcClient, count: number): Promise<PingReport> {
  const attempts: PingAttempt[] = [];
  try {
    for (let i = 0; i < count; i++) {
      const started = performance.now();
      const connection = await client.connect();
      attempts.push({
        connection: connection.id,
        connectMs: Math.round((performance.now() - started) * 100) / 100,
        sessionReused: connection.sessionReused,
      });
      await client.disconnect();
    }
  } finally {
    await client.close();
  }

  return {
    host: client.config.host,
    port: client.config.port,
    mode: client.config.mode,
    tls: client.config.tls !== null,
    attempts,
  };
}

export function formatPingReport(report: PingReport): string {
  const lines = [`${report.host}:${report.port} (${report.mode}${report.tls ? ', tls' : ''})`];
  for (const attempt of report.attempts) {
    const resumed = report.tls ? (attempt.sessionReused ? ', session resumed' : ', full handshake') : '';
    lines.push(`  connection #${attempt.connection}: ${attempt.connectMs}ms${resumed}`);
  }
  return lines.join('\n');
}

/**
 * Register ping command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerPingCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('ping')
      .description('Open connections to the server and report connect time and TLS resumption')
      .option(
        '-c, --count <n>',
        'Number of connections to open',
        (value: string): number => {
          const n = Number(value);
          if (!Number.isInteger(n) || n < 1 || n > 100) {
            throw new InvalidArgumentError('Count must be an integer between 1 and 100.');
          }
          return n;
        },
        1
      )
  ).action(async (options: PingOptions) => {
    await runCommand(
      async (opts) => ({
        success: true,
        data: await pingServer(new RpcClient(toClientOptions(opts)), opts.count),
      }),
      options,
      formatPingReport
    );
  });
}
