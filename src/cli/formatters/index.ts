import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export function createFormatter(options: Partial<FormatOptions> = {}): IFormatter {
  return options.format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}

export { HumanFormatter, JsonFormatter };
export type { AnalysisReport, FormatOptions, IFormatter, OutputFormat } from './types.js';
