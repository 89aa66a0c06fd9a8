import { InvalidOptionError } from "./errors.js";

// nonNegativeIntOption validates an optional integer option and applies its default.
export function nonNegativeIntOption(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isSafeInteger(value)) throw new InvalidOptionError(`${name} must be an integer`);
  if (value < 0) throw new InvalidOptionError(`${name} must be >= 0`);
  return value;
}
