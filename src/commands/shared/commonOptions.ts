import { readFileSync } from 'node:fs';

import { InvalidArgumentError, Option } from 'commander';

import type { Command } from 'commander';

import type { ClientOptions } from '@/config.js';
import { DEFAULT_HOST, DEFAULT_PORT, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from '@/constants.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

import type { BaseCommandOptions } from './CommandRunner.js';

/**
 * Options shared by every command that talks to a server.
 */
export interface ConnectionCommandOptions extends BaseCommandOptions {
  host: string;
  port: number;
  raw?: boolean;
  tls?: boolean;
  /** Path to a PEM file with trusted CA certificates */
  ca?: string;
  insecure?: boolean;
  /** False when --no-session-resumption is given */
  sessionResumption: boolean;
  timeout: number;
  userAgent: string;
}

function parseIntegerOption(name: string, min: number, max: number): (value: string) => number {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new InvalidArgumentError(`${name} must be an integer between ${min} and ${max}.`);
    }
    return n;
  };
}

/**
 * Shared --json flag for machine-readable output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Add the server address, transport and TLS options to a command.
 *
 * @example
 * ```typescript
 * addConnectionOptions(program.command('ping')).action(async (options: ConnectionCommandOptions) => {
 *   const client = new RpcClient(toClientOptions(options));
 * });
 * ```
 */
export function addConnectionOptions(command: Command): Command {
  return command
    .addOption(new Option('--host <host>', 'Server address').default(DEFAULT_HOST))
    .addOption(
      new Option('-p, --port <port>', 'Server port')
        .default(DEFAULT_PORT)
        .argParser(parseIntegerOption('Port', 1, 65535))
    )
    .addOption(new Option('--raw', 'Use NUL-terminated raw framing instead of HTTP'))
    .addOption(new Option('--tls', 'Connect over TLS'))
    .addOption(new Option('--ca <file>', 'PEM file with trusted CA certificates (implies --tls)'))
    .addOption(
      new Option('--insecure', 'Accept self-signed certificates; skips all verification (implies --tls)')
    )
    .addOption(new Option('--no-session-resumption', 'Always perform a full TLS handshake'))
    .addOption(
      new Option('--timeout <ms>', 'Fail when the socket is idle this long (0 = never)')
        .default(DEFAULT_TIMEOUT_MS)
        .argParser(parseIntegerOption('Timeout', 0, 24 * 60 * 60 * 1000))
    )
    .addOption(new Option('--user-agent <ua>', 'User-Agent header in HTTP mode').default(DEFAULT_USER_AGENT))
    .addOption(jsonOption);
}

/**
 * Translate parsed command-line options into client options.
 *
 * @throws CommandError if the CA file cannot be read
 */
export function toClientOptions(options: ConnectionCommandOptions): ClientOptions {
  const useTls = Boolean(options.tls || options.ca !== undefined || options.insecure);

  let ca: Buffer | undefined;
  if (options.ca !== undefined) {
    try {
      ca = readFileSync(options.ca);
    } catch (error) {
      throw new CommandError(
        `Cannot read CA file ${options.ca}: ${getErrorMessage(error)}`,
        { suggestion: 'Pass a PEM file with --ca, or use --insecure for self-signed servers' },
        EXIT_CODES.FILE_NOT_READABLE
      );
    }
  }

  return {
    host: options.host,
    port: options.port,
    mode: options.raw ? 'raw' : 'http',
    userAgent: options.userAgent,
    timeoutMs: options.timeout,
    tls: useTls
      ? {
          ...(ca !== undefined && { ca }),
          allowSelfSigned: options.insecure ?? false,
          sessionResumption: options.sessionResumption,
        }
      : false,
  };
}
