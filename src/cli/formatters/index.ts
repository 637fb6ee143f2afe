import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export { HumanFormatter, JsonFormatter };
export type { FormatOptions, IFormatter, OutputFormat };

/**
 * Create a formatter for the requested output format.
 */
export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
