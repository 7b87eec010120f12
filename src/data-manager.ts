import fs from 'fs/promises';
import path from 'path';
import csv from 'csv-parser';
import { createObjectCsvStringifier } from 'csv-writer';
import { createReadStream } from 'fs';
import { z } from 'zod';
import type { Config, ConfirmedInvoice, HourEntry, PendingInvoice } from './types.js';
import { StorageIOError } from './errors.js';
import { isValidDateString } from './date-utils.js';
import { writeFileAtomic } from './helper/atomicWrite.js';

type CsvRow = Record<string, string>;

const LEDGER_HEADER = [
  { id: 'date', title: 'Date' },
  { id: 'hours', title: 'Hours' },
  { id: 'description', title: 'Description' },
  { id: 'loggedAt', title: 'Logged At' },
];

const INVOICE_HEADER = [
  { id: 'invoiceNumber', title: 'Invoice Number' },
  { id: 'startDate', title: 'Start Date' },
  { id: 'endDate', title: 'End Date' },
  { id: 'totalHours', title: 'Hours' },
  { id: 'amount', title: 'Amount' },
  { id: 'confirmedOn', title: 'Confirmed On' },
];

const isoDate = z.string().refine(isValidDateString, 'Expected a YYYY-MM-DD date');

const pendingInvoiceSchema = z.object({
  invoiceNumber: z.number().int(),
  startDate: isoDate,
  endDate: isoDate,
  totalHours: z.number().nonnegative(),
  amount: z.number().nonnegative(),
  outputPath: z.string(),
  generatedAt: z.string(),
});

/**
 * Persistence contract the ledger depends on. Both calls move the whole ledger.
 */
export interface LedgerStore {
  loadLedger(): Promise<HourEntry[]>;
  saveLedger(entries: HourEntry[]): Promise<void>;
}

export class DataManager implements LedgerStore {
  private config: Config;
  private readonly ledgerPath: string;
  private readonly invoicesPath: string;
  private readonly pendingInvoicePath: string;

  constructor(config: Config) {
    this.config = config;
    this.ledgerPath = path.join(config.dataDirectory, 'hours-entries.csv');
    this.invoicesPath = path.join(config.dataDirectory, 'invoices.csv');
    this.pendingInvoicePath = path.join(config.dataDirectory, 'pending-invoice.json');
  }

  async ensureDataDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.config.dataDirectory, { recursive: true });
    } catch (error) {
      throw new StorageIOError('Failed to create data directory', this.config.dataDirectory, error);
    }
  }

  async loadLedger(): Promise<HourEntry[]> {
    const rows = await this.readCsv(this.ledgerPath);

    return rows.map((row, index) => {
      // Support both original field ids and header titles
      const date = row.date || row.Date;
      const hoursRaw = row.hours || row.Hours;
      const hours = parseFloat(hoursRaw);

      if (!isValidDateString(date) || !Number.isFinite(hours) || hours <= 0) {
        throw new StorageIOError(`Malformed ledger row ${index + 1}`, this.ledgerPath);
      }

      const entry: HourEntry = {
        date,
        hours,
        loggedAt: row.loggedAt || row['Logged At'] || '',
      };
      const description = row.description || row.Description;
      if (description) {
        entry.description = description;
      }
      return entry;
    });
  }

  async saveLedger(entries: HourEntry[]): Promise<void> {
    const records = entries.map((entry) => ({
      date: entry.date,
      hours: entry.hours,
      description: entry.description ?? '',
      loggedAt: entry.loggedAt,
    }));
    await this.writeCsv(this.ledgerPath, LEDGER_HEADER, records);
  }

  async loadInvoices(): Promise<ConfirmedInvoice[]> {
    const rows = await this.readCsv(this.invoicesPath);

    return rows.map((row, index) => {
      const invoice: ConfirmedInvoice = {
        invoiceNumber: parseInt(row.invoiceNumber || row['Invoice Number'], 10),
        startDate: row.startDate || row['Start Date'],
        endDate: row.endDate || row['End Date'],
        totalHours: parseFloat(row.totalHours || row.Hours),
        amount: parseFloat(row.amount || row.Amount),
        confirmedOn: row.confirmedOn || row['Confirmed On'],
      };

      if (
        !Number.isInteger(invoice.invoiceNumber) ||
        !isValidDateString(invoice.startDate) ||
        !isValidDateString(invoice.endDate)
      ) {
        throw new StorageIOError(`Malformed invoice row ${index + 1}`, this.invoicesPath);
      }
      return invoice;
    });
  }

  async saveInvoices(invoices: ConfirmedInvoice[]): Promise<void> {
    const records = invoices.map((invoice) => ({
      invoiceNumber: invoice.invoiceNumber,
      startDate: invoice.startDate,
      endDate: invoice.endDate,
      totalHours: invoice.totalHours,
      amount: invoice.amount,
      confirmedOn: invoice.confirmedOn,
    }));
    await this.writeCsv(this.invoicesPath, INVOICE_HEADER, records);
  }

  async loadPendingInvoice(): Promise<PendingInvoice | null> {
    let data: string;
    try {
      data = await fs.readFile(this.pendingInvoicePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new StorageIOError('Failed to read pending invoice', this.pendingInvoicePath, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new StorageIOError('Pending invoice is not valid JSON', this.pendingInvoicePath, error);
    }

    const parsed = pendingInvoiceSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageIOError(
        'Pending invoice is malformed',
        this.pendingInvoicePath,
        parsed.error.flatten()
      );
    }
    return parsed.data;
  }

  async savePendingInvoice(invoice: PendingInvoice): Promise<void> {
    try {
      await writeFileAtomic(this.pendingInvoicePath, JSON.stringify(invoice, null, 2));
    } catch (error) {
      throw new StorageIOError('Failed to save pending invoice', this.pendingInvoicePath, error);
    }
  }

  async clearPendingInvoice(): Promise<void> {
    try {
      await fs.rm(this.pendingInvoicePath, { force: true });
    } catch (error) {
      throw new StorageIOError('Failed to clear pending invoice', this.pendingInvoicePath, error);
    }
  }

  getLedgerPath(): string {
    return this.ledgerPath;
  }

  getInvoicesPath(): string {
    return this.invoicesPath;
  }

  private async readCsv(filePath: string): Promise<CsvRow[]> {
    await this.ensureDataDirectory();

    if (!(await this.fileExists(filePath))) {
      return [];
    }

    return new Promise((resolve, reject) => {
      const rows: CsvRow[] = [];
      createReadStream(filePath)
        .on('error', (error) => reject(new StorageIOError('Failed to read file', filePath, error)))
        .pipe(csv())
        .on('data', (row: CsvRow) => rows.push(row))
        .on('end', () => resolve(rows))
        .on('error', (error) => reject(new StorageIOError('Failed to parse CSV', filePath, error)));
    });
  }

  private async writeCsv(
    filePath: string,
    header: { id: string; title: string }[],
    records: Record<string, string | number>[]
  ): Promise<void> {
    const stringifier = createObjectCsvStringifier({ header });
    const data = (stringifier.getHeaderString() ?? '') + stringifier.stringifyRecords(records);

    try {
      await writeFileAtomic(filePath, data);
    } catch (error) {
      throw new StorageIOError('Failed to write file', filePath, error);
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
