import chalk from 'chalk';
import type { Dayjs } from 'dayjs';
import Table from 'cli-table3';
import type { Config, DateRange, SummaryResult, SummaryWindow } from './types.js';
import type { HoursLedger } from './hours-ledger.js';
import { InvalidDateError } from './errors.js';
import { parseMonthToken, parseYearToken, resolveDate } from './date-resolver.js';
import {
  dayjs,
  parseStrict,
  getWeekStart,
  getWeekEnd,
  sumHours,
  formatHours,
  FORMAT_DATE,
  FORMAT_DATE_DAY,
  FORMAT_DATE_DAY_YEAR,
} from './date-utils.js';

export const SUMMARY_PERIODS = ['day', 'week', 'month', 'year'] as const;

export type SummaryPeriod = (typeof SUMMARY_PERIODS)[number];

export function isSummaryPeriod(value: string): value is SummaryPeriod {
  return SUMMARY_PERIODS.some((period) => period === value);
}

// Four digit years only; a month outside 1-12 fails the strict parse.
function firstDayOfMonth(year: number, month: number): Dayjs {
  const token = `${year}-${String(month).padStart(2, '0')}`;
  const first =
    Number.isInteger(year) && year >= 1000 && year <= 9999
      ? parseStrict(`${token}-01`, FORMAT_DATE)
      : null;
  if (!first) {
    throw new InvalidDateError(token);
  }
  return first;
}

/**
 * Translates a window into the inclusive range of dates it covers.
 */
export function windowToRange(window: SummaryWindow): DateRange {
  switch (window.kind) {
    case 'day':
      return { startDate: window.date, endDate: window.date };
    case 'week': {
      const date = dayjs(window.date, FORMAT_DATE);
      return {
        startDate: getWeekStart(date).format(FORMAT_DATE),
        endDate: getWeekEnd(date).format(FORMAT_DATE),
      };
    }
    case 'month': {
      const first = firstDayOfMonth(window.year, window.month);
      return {
        startDate: first.format(FORMAT_DATE),
        endDate: first.endOf('month').format(FORMAT_DATE),
      };
    }
    case 'year': {
      const first = firstDayOfMonth(window.year, 1);
      return {
        startDate: first.format(FORMAT_DATE),
        endDate: first.endOf('year').format(FORMAT_DATE),
      };
    }
    default: {
      const unknownWindow: never = window;
      throw new Error(`Unknown summary window: ${JSON.stringify(unknownWindow)}`);
    }
  }
}

/**
 * Builds a window from CLI tokens. Without a value the window containing
 * `reference` is used.
 */
export function parseSummaryWindow(
  period: SummaryPeriod,
  value: string | undefined,
  reference: string
): SummaryWindow {
  switch (period) {
    case 'day':
      return { kind: 'day', date: resolveDate(value ?? 'today', reference) };
    case 'week':
      return { kind: 'week', date: resolveDate(value ?? 'today', reference) };
    case 'month': {
      if (value) {
        return { kind: 'month', ...parseMonthToken(value) };
      }
      const ref = dayjs(reference, FORMAT_DATE);
      return { kind: 'month', year: ref.year(), month: ref.month() + 1 };
    }
    case 'year':
      return {
        kind: 'year',
        year: value ? parseYearToken(value) : dayjs(reference, FORMAT_DATE).year(),
      };
  }
}

export function describeWindow(window: SummaryWindow): string {
  const { startDate, endDate } = windowToRange(window);
  switch (window.kind) {
    case 'day':
      return dayjs(startDate).format('dddd, MMMM Do, YYYY');
    case 'week':
      return `${dayjs(startDate).format(FORMAT_DATE_DAY)} - ${dayjs(endDate).format(FORMAT_DATE_DAY_YEAR)}`;
    case 'month':
      return dayjs(startDate).format('MMMM YYYY');
    case 'year':
      return `${window.year}`;
  }
}

export class SummaryManager {
  private config: Config;
  private ledger: HoursLedger;

  constructor(config: Config, ledger: HoursLedger) {
    this.config = config;
    this.ledger = ledger;
  }

  summarize(window: SummaryWindow): SummaryResult {
    const { startDate, endDate } = windowToRange(window);
    const entries = this.ledger.entriesInRange(startDate, endDate);

    return {
      window,
      startDate,
      endDate,
      totalHours: sumHours(entries.map((entry) => entry.hours)),
      entries,
    };
  }

  showSummary(
    window: SummaryWindow,
    options: { format?: 'table' | 'json' } = {}
  ): void | SummaryResult {
    const outputFormat = options.format || 'table';
    const result = this.summarize(window);

    if (outputFormat === 'json') {
      return result;
    }

    console.log(chalk.blue.bold(`\n📊 Work Summary (${describeWindow(window)})\n`));

    if (result.entries.length === 0) {
      console.log(chalk.yellow('No work hours recorded for this period.'));
      console.log();
      return;
    }

    const table = new Table({
      head: [chalk.cyan('Date'), chalk.cyan('Hours'), chalk.cyan('Description')],
      colWidths: [15, 10, 50],
      wordWrap: true,
    });

    result.entries.forEach((entry) => {
      table.push([entry.date, formatHours(entry.hours), entry.description || '-']);
    });

    console.log(table.toString());

    const amount = result.totalHours * this.config.hourlyRate;
    console.log(chalk.cyan(`\nTotal hours: ${formatHours(result.totalHours)}`));
    console.log(
      chalk.cyan(
        `Billable at ${this.config.currencySymbol}${this.config.hourlyRate.toFixed(2)}/h: ${this.config.currencySymbol}${amount.toFixed(2)}`
      )
    );
    console.log();
  }

  showEntries(startDate: string, endDate: string): void {
    const entries = this.ledger.entriesInRange(startDate, endDate);

    console.log(chalk.blue.bold(`\n📋 Entries (${startDate} - ${endDate})\n`));

    if (entries.length === 0) {
      console.log(chalk.yellow('No work hours recorded for this period.'));
      console.log();
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan('Date'),
        chalk.cyan('Hours'),
        chalk.cyan('Description'),
        chalk.cyan('Logged'),
      ],
      colWidths: [15, 10, 40, 22],
      wordWrap: true,
    });

    entries.forEach((entry) => {
      table.push([
        entry.date,
        formatHours(entry.hours),
        entry.description || '-',
        entry.loggedAt
          ? dayjs(entry.loggedAt).tz(this.config.timezone).format('YYYY-MM-DD HH:mm')
          : '-',
      ]);
    });

    console.log(table.toString());
    console.log(
      chalk.cyan(`\nTotal hours: ${formatHours(sumHours(entries.map((entry) => entry.hours)))}`)
    );
    console.log();
  }
}
