import { InvalidArgumentError } from 'commander';

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parses `1500ms`, `90s`, `2m`, `1h` or a bare number of seconds into
 * milliseconds.
 */
export function parseDuration(value: string): number {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`invalid duration "${value}" (try 90s, 2m or 1500ms)`);
  }

  const ms = Math.round(Number(match[1]) * UNIT_MS[match[2] ?? 's']);
  if (ms <= 0) {
    throw new InvalidArgumentError('duration must be positive');
  }
  return ms;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`expected a number, got "${value}"`);
  }
  return parsed;
}
