import { InvalidDateError } from './errors.js';
import {
  FORMAT_DATE,
  FORMAT_MONTH,
  FORMAT_YEAR,
  addDays,
  parseStrict,
  today,
} from './date-utils.js';

export const DATE_ALIASES = ['today', 'tomorrow', 'yesterday', 'daybefore'] as const;

export type DateAlias = (typeof DATE_ALIASES)[number];

export function isDateAlias(token: string): token is DateAlias {
  return DATE_ALIASES.some((alias) => alias === token);
}

function aliasOffset(alias: DateAlias): number {
  switch (alias) {
    case 'today':
      return 0;
    case 'tomorrow':
      return 1;
    case 'yesterday':
      return -1;
    case 'daybefore':
      return -2;
    default: {
      const unknownAlias: never = alias;
      throw new InvalidDateError(unknownAlias);
    }
  }
}

/**
 * Turns a user supplied date token into a canonical YYYY-MM-DD date.
 *
 * Accepts a relative alias (case-insensitive) resolved against `reference`,
 * or a literal ISO date that must exist on the calendar.
 */
export function resolveDate(token: string, reference: string = today()): string {
  const normalized = token.trim().toLowerCase();

  if (isDateAlias(normalized)) {
    if (!parseStrict(reference, FORMAT_DATE)) {
      throw new InvalidDateError(reference);
    }
    return addDays(reference, aliasOffset(normalized));
  }

  const parsed = parseStrict(normalized, FORMAT_DATE);
  if (!parsed) {
    throw new InvalidDateError(token);
  }
  return parsed.format(FORMAT_DATE);
}

export function parseMonthToken(token: string): { year: number; month: number } {
  const parsed = parseStrict(token.trim(), FORMAT_MONTH);
  if (!parsed) {
    throw new InvalidDateError(token);
  }
  return { year: parsed.year(), month: parsed.month() + 1 };
}

export function parseYearToken(token: string): number {
  const parsed = parseStrict(token.trim(), FORMAT_YEAR);
  if (!parsed) {
    throw new InvalidDateError(token);
  }
  return parsed.year();
}
