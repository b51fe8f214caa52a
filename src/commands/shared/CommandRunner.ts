import { RemoteError, RpcError } from '@/errors/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';
import { VERSION } from '@/utils/version.js';

/**
 * Standard options supported by CommandRunner.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  /** Exit code override for failed results */
  exitCode?: number;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output of a successful result.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Build the JSON body printed for a failed command.
 */
export function buildJsonError(
  error: string | Error,
  extra?: Record<string, unknown>
): Record<string, unknown> {
  return {
    version: VERSION,
    success: false,
    error: error instanceof Error ? error.message : error,
    ...extra,
  };
}

/**
 * Describe a thrown error for output: message, extra JSON fields, exit code.
 */
export function describeFailure(error: unknown): {
  message: string;
  extra: Record<string, unknown>;
  hints: string[];
  exitCode: number;
} {
  if (error instanceof CommandError) {
    return {
      message: error.message,
      extra: { ...error.metadata },
      hints: error.metadata.suggestion ? [error.metadata.suggestion] : [],
      exitCode: error.exitCode,
    };
  }
  if (error instanceof RemoteError) {
    return { message: error.message, extra: { remoteError: error.error }, hints: [], exitCode: error.exitCode };
  }
  if (error instanceof RpcError) {
    return { message: error.message, extra: { errorType: error.name }, hints: [], exitCode: error.exitCode };
  }
  return {
    message: getErrorMessage(error),
    extra: {},
    hints: [],
    exitCode: EXIT_CODES.UNHANDLED_EXCEPTION,
  };
}

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * Results go to stdout; human-readable errors go to stderr. Calls
 * `process.exit()` with the matching exit code.
 *
 * @param handler - Command logic that returns CommandResult or throws
 * @param options - Command options (must include json flag)
 * @param formatter - Optional human-readable formatter (raw JSON otherwise)
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<void> {
  try {
    const result = await handler(options);

    if (!result.success) {
      const message = result.error ?? 'Unknown error';
      if (options.json) {
        console.log(JSON.stringify(buildJsonError(message), null, 2));
      } else {
        console.error(`Error: ${message}`);
      }
      process.exit(result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION);
    }

    if (options.json || !formatter || result.data === undefined) {
      console.log(JSON.stringify(result.data ?? null, null, 2));
    } else {
      console.log(formatter(result.data));
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    const failure = describeFailure(error);
    if (options.json) {
      console.log(JSON.stringify(buildJsonError(failure.message, failure.extra), null, 2));
    } else {
      console.error(`Error: ${failure.message}`);
      for (const hint of failure.hints) {
        console.error(hint);
      }
    }
    process.exit(failure.exitCode);
  }
}
