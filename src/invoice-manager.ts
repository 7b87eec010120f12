import chalk from 'chalk';
import Table from 'cli-table3';
import type {
  Config,
  ConfirmedInvoice,
  DateRange,
  HourEntry,
  InvoiceDraft,
  PendingInvoice,
} from './types.js';
import type { HoursLedger } from './hours-ledger.js';
import type { DataManager } from './data-manager.js';
import type { InvoiceNumberAllocator } from './invoice-number-allocator.js';
import type { InvoiceRenderer } from './invoice-composer.js';
import {
  DuplicateInvoiceNumberError,
  InvalidRangeError,
  InvoiceNotFoundError,
  NoPendingInvoiceError,
  NothingToInvoiceError,
  StaleInvoiceNumberError,
} from './errors.js';
import { resolveDate } from './date-resolver.js';
import { addDays, dayjs, formatHours, sumHours, today } from './date-utils.js';

export interface GeneratedInvoice {
  draft: InvoiceDraft;
  outputPath: string;
}

export interface ConfirmationResult {
  invoice: ConfirmedInvoice;
  nextNumber: number;
}

function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

function lastConfirmedInvoice(invoices: ConfirmedInvoice[]): ConfirmedInvoice | undefined {
  return invoices.reduce<ConfirmedInvoice | undefined>(
    (latest, invoice) => (!latest || invoice.endDate > latest.endDate ? invoice : latest),
    undefined
  );
}

/**
 * Drives invoice generation and confirmation on top of the ledger and the
 * invoice number allocator.
 *
 * Generating renders a PDF with the number currently on offer and remembers it
 * as the pending invoice. Confirming consumes that number and records the
 * billing period, which is where the next invoice starts.
 */
export class InvoiceManager {
  private config: Config;
  private ledger: HoursLedger;
  private dataManager: DataManager;
  private allocator: InvoiceNumberAllocator;
  private renderer: InvoiceRenderer;

  constructor(
    config: Config,
    ledger: HoursLedger,
    dataManager: DataManager,
    allocator: InvoiceNumberAllocator,
    renderer: InvoiceRenderer
  ) {
    this.config = config;
    this.ledger = ledger;
    this.dataManager = dataManager;
    this.allocator = allocator;
    this.renderer = renderer;
  }

  /**
   * Works out the next billing period and prices it. Nothing is persisted.
   *
   * The period starts the day after the last confirmed invoice ended, or at the
   * earliest logged entry when nothing has been confirmed yet.
   */
  async draftInvoice(
    endDateToken?: string,
    reference: string = this.today()
  ): Promise<InvoiceDraft> {
    const endDate = resolveDate(endDateToken ?? 'today', reference);
    const invoices = await this.dataManager.loadInvoices();
    const lastInvoice = lastConfirmedInvoice(invoices);

    const startDate = lastInvoice ? addDays(lastInvoice.endDate, 1) : this.ledger.earliestDate();
    if (!startDate) {
      throw new NothingToInvoiceError();
    }
    if (startDate > endDate) {
      throw new InvalidRangeError(startDate, endDate);
    }

    const entries = this.ledger.entriesInRange(startDate, endDate);
    if (entries.length === 0) {
      throw new NothingToInvoiceError(startDate, endDate);
    }

    return this.buildDraft(this.allocator.peekNext(), { startDate, endDate }, entries, reference);
  }

  /**
   * Renders the next invoice. The pending invoice is only stored once the
   * renderer succeeded, so a failed render leaves no trace.
   */
  async generateInvoice(
    endDateToken: string | undefined,
    outputPath: string,
    reference: string = this.today()
  ): Promise<GeneratedInvoice> {
    const draft = await this.draftInvoice(endDateToken, reference);
    const writtenPath = await this.renderer.render(draft, outputPath);

    const pending: PendingInvoice = {
      invoiceNumber: draft.invoiceNumber,
      startDate: draft.startDate,
      endDate: draft.endDate,
      totalHours: draft.totalHours,
      amount: draft.amount,
      outputPath: writtenPath,
      generatedAt: dayjs().toISOString(),
    };
    await this.dataManager.savePendingInvoice(pending);

    return { draft, outputPath: writtenPath };
  }

  /**
   * Confirms that the pending invoice was sent. Only the number of the invoice
   * generated last can be confirmed.
   */
  async confirmInvoice(
    invoiceNumberToken: string,
    confirmationDateToken?: string,
    reference: string = this.today()
  ): Promise<ConfirmationResult> {
    const invoiceNumber = this.allocator.parse(invoiceNumberToken);
    const confirmedOn = resolveDate(confirmationDateToken ?? 'today', reference);

    const pending = await this.dataManager.loadPendingInvoice();
    if (!pending) {
      throw new NoPendingInvoiceError();
    }
    if (pending.invoiceNumber !== invoiceNumber) {
      throw new StaleInvoiceNumberError(invoiceNumber, pending.invoiceNumber);
    }

    const invoices = await this.dataManager.loadInvoices();
    if (invoices.some((existing) => existing.invoiceNumber === invoiceNumber)) {
      throw new DuplicateInvoiceNumberError(invoiceNumber);
    }

    const nextNumber = await this.allocator.confirm(invoiceNumber);

    const invoice: ConfirmedInvoice = {
      invoiceNumber,
      startDate: pending.startDate,
      endDate: pending.endDate,
      totalHours: pending.totalHours,
      amount: pending.amount,
      confirmedOn,
    };
    await this.dataManager.saveInvoices([...invoices, invoice]);
    await this.dataManager.clearPendingInvoice();

    return { invoice, nextNumber };
  }

  /**
   * Renders a confirmed invoice again from its stored period. The counter is
   * not involved.
   */
  async regenerateInvoice(
    invoiceNumberToken: string,
    outputPath: string
  ): Promise<GeneratedInvoice> {
    const invoiceNumber = this.allocator.parse(invoiceNumberToken);
    const invoices = await this.dataManager.loadInvoices();
    const invoice = invoices.find((candidate) => candidate.invoiceNumber === invoiceNumber);
    if (!invoice) {
      throw new InvoiceNotFoundError(invoiceNumber);
    }

    const entries = this.ledger.entriesInRange(invoice.startDate, invoice.endDate);
    const draft = this.buildDraft(invoiceNumber, invoice, entries, invoice.confirmedOn);
    const writtenPath = await this.renderer.render(draft, outputPath);

    return { draft, outputPath: writtenPath };
  }

  async listInvoices(): Promise<ConfirmedInvoice[]> {
    const invoices = await this.dataManager.loadInvoices();
    return [...invoices].sort((a, b) => a.invoiceNumber - b.invoiceNumber);
  }

  async getPendingInvoice(): Promise<PendingInvoice | null> {
    return this.dataManager.loadPendingInvoice();
  }

  async showInvoices(): Promise<void> {
    const invoices = await this.listInvoices();
    const pending = await this.getPendingInvoice();
    const { currencySymbol } = this.config;

    console.log(chalk.blue.bold('\n🧾 Invoices\n'));

    if (invoices.length === 0) {
      console.log(chalk.yellow('No confirmed invoices yet.'));
    } else {
      const table = new Table({
        head: [
          chalk.cyan('Invoice'),
          chalk.cyan('Period'),
          chalk.cyan('Hours'),
          chalk.cyan('Amount'),
          chalk.cyan('Confirmed'),
        ],
        colWidths: [12, 27, 10, 14, 14],
      });

      invoices.forEach((invoice) => {
        table.push([
          this.allocator.format(invoice.invoiceNumber),
          `${invoice.startDate} - ${invoice.endDate}`,
          formatHours(invoice.totalHours),
          `${currencySymbol}${invoice.amount.toFixed(2)}`,
          invoice.confirmedOn,
        ]);
      });

      console.log(table.toString());
    }

    if (pending) {
      console.log(
        chalk.yellow(
          `\nAwaiting confirmation: ${this.allocator.format(pending.invoiceNumber)} (${pending.startDate} - ${pending.endDate})`
        )
      );
    }
    console.log(
      chalk.cyan(`Next invoice number: ${this.allocator.format(this.allocator.peekNext())}`)
    );
    console.log();
  }

  private buildDraft(
    invoiceNumber: number,
    range: DateRange,
    entries: HourEntry[],
    issueDate: string
  ): InvoiceDraft {
    const totalHours = sumHours(entries.map((entry) => entry.hours));

    return {
      invoiceNumber,
      formattedNumber: this.allocator.format(invoiceNumber),
      startDate: range.startDate,
      endDate: range.endDate,
      issueDate,
      dueDate: addDays(issueDate, this.config.invoice.paymentTermsDays),
      entries,
      totalHours,
      hourlyRate: this.config.hourlyRate,
      amount: roundCurrency(totalHours * this.config.hourlyRate),
      currencySymbol: this.config.currencySymbol,
      company: this.config.company,
      client: this.config.client,
      footerText: this.config.invoice.footerText,
    };
  }

  private today(): string {
    return today(this.config.timezone);
  }
}
