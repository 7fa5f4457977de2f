/**
 * Option parsers shared by the commands.
 */
import { InvalidArgumentError } from 'commander';

/**
 * Parse a base-10 integer option; commander reports the thrown error.
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return Number(trimmed);
}
