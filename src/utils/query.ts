import { NotFoundError, ValidationError } from '../errors.js';

function asStrings(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string');
  return [];
}

/**
 * Truthiness of a query flag such as `assigned_only`.
 * Integers are true when non-zero; `true`, `yes` and `on` are true.
 */
export function parseFlag(value: unknown): boolean {
  const [raw] = asStrings(value);
  if (raw === undefined) return false;

  const flag = raw.trim().toLowerCase();
  if (/^-?\d+$/.test(flag)) {
    return Number(flag) !== 0;
  }
  return flag === 'true' || flag === 'yes' || flag === 'on';
}

/**
 * Comma-separated ids, e.g. `?tags=1,3`. Repeated params are joined.
 * Returns undefined when the parameter is absent or empty.
 */
export function parseIdList(value: unknown, field: string): number[] | undefined {
  const parts = asStrings(value)
    .flatMap(item => item.split(','))
    .map(part => part.trim())
    .filter(part => part !== '');

  if (parts.length === 0) return undefined;

  if (!parts.every(part => /^\d+$/.test(part))) {
    throw new ValidationError({ [field]: ['Expected a comma-separated list of integer ids.'] });
  }
  return [...new Set(parts.map(Number))];
}

/**
 * Route id parameter. Non-numeric ids cannot match a record.
 */
export function parseRouteId(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new NotFoundError();
  }
  return Number(value);
}
