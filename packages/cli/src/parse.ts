/**
 * Argument parsers for numeric command-line options
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a finite number of seconds
 */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

/**
 * Parse a whole number
 *
 * Range checks are left to the scheduler, so `--max-workers 0` reaches it
 * and is reported as a configuration error.
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}
