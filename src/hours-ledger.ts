import type { HourEntry } from './types.js';
import { InvalidDateError, InvalidHoursError, InvalidRangeError } from './errors.js';
import { resolveDate } from './date-resolver.js';
import { dayjs, isDateInRange, isValidDateString } from './date-utils.js';
import type { LedgerStore } from './data-manager.js';

const DECIMAL_HOURS = /^(\d+(\.\d*)?|\.\d+)$/;

/**
 * Accepts a number or a plain decimal string. Anything that isn't a finite
 * positive number fails with InvalidHoursError.
 */
export function parseHours(value: number | string): number {
  if (typeof value === 'string' && !DECIMAL_HOURS.test(value.trim())) {
    throw new InvalidHoursError(value);
  }
  const hours = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new InvalidHoursError(value);
  }
  return hours;
}

/**
 * Date-keyed set of hour entries. At most one entry per date; logging a date
 * again replaces the entry. Every mutation is written through the store before
 * it resolves.
 */
export class HoursLedger {
  private entries = new Map<string, HourEntry>();
  private store: LedgerStore;

  constructor(store: LedgerStore, entries: HourEntry[] = []) {
    this.store = store;
    for (const entry of entries) {
      this.entries.set(entry.date, entry);
    }
  }

  static async load(store: LedgerStore): Promise<HoursLedger> {
    const entries = await store.loadLedger();
    return new HoursLedger(store, entries);
  }

  async logHours(
    date: string,
    hours: number | string,
    description?: string,
    reference?: string
  ): Promise<HourEntry> {
    const validHours = parseHours(hours);
    const resolvedDate = resolveDate(date, reference);

    const entry: HourEntry = {
      date: resolvedDate,
      hours: validHours,
      loggedAt: dayjs().toISOString(),
    };
    const trimmed = description?.trim();
    if (trimmed) {
      entry.description = trimmed;
    }

    const previous = this.entries.get(resolvedDate);
    this.entries.set(resolvedDate, entry);

    try {
      await this.store.saveLedger(this.allEntries());
    } catch (error) {
      // Keep memory in line with what's on disk
      if (previous) {
        this.entries.set(resolvedDate, previous);
      } else {
        this.entries.delete(resolvedDate);
      }
      throw error;
    }

    return { ...entry };
  }

  getEntry(date: string): HourEntry | undefined {
    const entry = this.entries.get(date);
    return entry ? { ...entry } : undefined;
  }

  entriesInRange(startDate: string, endDate: string): HourEntry[] {
    if (!isValidDateString(startDate)) throw new InvalidDateError(startDate);
    if (!isValidDateString(endDate)) throw new InvalidDateError(endDate);
    if (startDate > endDate) {
      throw new InvalidRangeError(startDate, endDate);
    }

    return this.allEntries().filter((entry) => isDateInRange(entry.date, startDate, endDate));
  }

  allEntries(): HourEntry[] {
    return [...this.entries.values()]
      .map((entry) => ({ ...entry }))
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  earliestDate(): string | undefined {
    return this.allEntries()[0]?.date;
  }

  get size(): number {
    return this.entries.size;
  }
}
