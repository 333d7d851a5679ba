/**
 * Formatter Factory
 *
 * Maps the `--format` value to a formatter. Commands never construct a
 * formatter class directly.
 */

import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';
import { NullFormatter } from './NullFormatter.js';

export type FormatterType = 'human' | 'json' | 'null';

export const FORMATTER_TYPES: readonly FormatterType[] = ['human', 'json', 'null'];

/**
 * Narrow a raw `--format` value
 */
export function isFormatterType(value: unknown): value is FormatterType {
  return typeof value === 'string' && FORMATTER_TYPES.some((type) => type === value);
}

/**
 * @example
 * ```ts
 * const formatter = createFormatter('json', { silent: true });
 * runner.getEventBus().on('*', (event) => formatter.onEvent(event));
 * ```
 */
export function createFormatter(
  type: FormatterType = 'human',
  options: FormatterOptions = {}
): Formatter {
  switch (type) {
    case 'human':
      return new HumanFormatter(options);
    case 'json':
      return new JsonFormatter(options);
    case 'null':
      return new NullFormatter(options);
    default: {
      const unreachable: never = type;
      throw new Error(`Unknown formatter type: ${String(unreachable)}`);
    }
  }
}
