import type { JsonValue } from '@/envelope/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Parse one command-line argument: JSON when it parses, a plain string otherwise.
 *
 * @example
 * ```typescript
 * parseParamValue('42');      // 42
 * parseParamValue('[1,2]');   // [1, 2]
 * parseParamValue('hello');   // 'hello'
 * parseParamValue('"42"');    // '42'
 * ```
 */
export function parseParamValue(text: string): JsonValue {
  try {
    return JSON.parse(text) as JsonValue;
  } catch {
    return text;
  }
}

/**
 * Build call params from command-line arguments.
 *
 * @param args - Positional arguments after the method name
 * @param named - Treat every argument as `key=value`
 * @throws CommandError if a named argument has no `=` or an empty key
 */
export function parseParams(
  args: readonly string[],
  named = false
): JsonValue[] | { [key: string]: JsonValue } {
  if (!named) {
    return args.map(parseParamValue);
  }

  const params: { [key: string]: JsonValue } = {};
  for (const arg of args) {
    const eq = arg.indexOf('=');
    if (eq <= 0) {
      throw new CommandError(
        `Named parameter '${arg}' is not a key=value pair`,
        { suggestion: 'Example: wirecall call search --named query=shoes limit=10' },
        EXIT_CODES.INVALID_ARGUMENTS
      );
    }
    params[arg.slice(0, eq)] = parseParamValue(arg.slice(eq + 1));
  }
  return params;
}
