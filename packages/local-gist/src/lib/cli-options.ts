import { InvalidArgumentError } from "commander";

/**
 * Commander argument parser for whole numbers, optionally >= `min`.
 */
export function integerOption(min?: number): (value: string) => number {
  return (value: string) => {
    if (!/^-?\d+$/.test(value.trim())) {
      throw new InvalidArgumentError("Not a whole number.");
    }
    const parsed = Number.parseInt(value, 10);
    if (min !== undefined && parsed < min) {
      throw new InvalidArgumentError(`Must be at least ${min}.`);
    }
    return parsed;
  };
}

/**
 * Limit to apply: `--all` lifts it, `--limit` overrides the configured one.
 */
export function effectiveLimit(
  options: { limit?: number; all?: boolean },
  configured: number | undefined
): number | undefined {
  if (options.all) return undefined;
  return options.limit ?? configured;
}
