import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { InvoiceManager } from '../invoice-manager.js';
import { InvoiceNumberAllocator } from '../invoice-number-allocator.js';
import { DataManager } from '../data-manager.js';
import { HoursLedger } from '../hours-ledger.js';
import type { InvoiceRenderer } from '../invoice-composer.js';
import type { Config, InvoiceDraft } from '../types.js';
import {
  DuplicateInvoiceNumberError,
  InvalidRangeError,
  InvoiceNotFoundError,
  NoPendingInvoiceError,
  NothingToInvoiceError,
  StaleInvoiceNumberError,
} from '../errors.js';
import { MemoryConfigStore, makeConfig, makeTempDir } from './fixtures.js';

class RecordingRenderer implements InvoiceRenderer {
  drafts: InvoiceDraft[] = [];
  fail = false;

  async render(draft: InvoiceDraft, outputPath: string): Promise<string> {
    if (this.fail) {
      throw new Error('render failed');
    }
    this.drafts.push(draft);
    return path.resolve(outputPath);
  }
}

describe('InvoiceManager', () => {
  let dataDir: string;
  let dataManager: DataManager;
  let ledger: HoursLedger;
  let allocator: InvoiceNumberAllocator;
  let renderer: RecordingRenderer;
  let invoiceManager: InvoiceManager;
  let outputPath: string;
  let config: Config;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    outputPath = path.join(dataDir, 'invoice.pdf');
    config = makeConfig(dataDir);
    dataManager = new DataManager(config);
    ledger = await HoursLedger.load(dataManager);
    allocator = new InvoiceNumberAllocator(config, new MemoryConfigStore());
    renderer = new RecordingRenderer();
    invoiceManager = new InvoiceManager(config, ledger, dataManager, allocator, renderer);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function logSampleHours(): Promise<void> {
    await ledger.logHours('2025-04-01', 2, 'Kickoff');
    await ledger.logHours('2025-04-02', 3.5);
    await ledger.logHours('2025-04-10', 1.5);
  }

  it('has nothing to invoice before any hours are logged', async () => {
    await expect(invoiceManager.draftInvoice('2025-04-05', '2025-04-06')).rejects.toThrow(
      new NothingToInvoiceError()
    );
  });

  describe('with logged hours', () => {
    beforeEach(async () => {
      await logSampleHours();
    });

    it('drafts the first invoice from the earliest entry', async () => {
      const draft = await invoiceManager.draftInvoice('2025-04-05', '2025-04-06');

      expect(draft.invoiceNumber).toBe(1000);
      expect(draft.formattedNumber).toBe('INV-1000');
      expect(draft.startDate).toBe('2025-04-01');
      expect(draft.endDate).toBe('2025-04-05');
      expect(draft.entries.map((entry) => entry.date)).toEqual(['2025-04-01', '2025-04-02']);
      expect(draft.totalHours).toBe(5.5);
      expect(draft.amount).toBe(275);
      expect(draft.issueDate).toBe('2025-04-06');
      expect(draft.dueDate).toBe('2025-05-06');
      expect(await dataManager.loadPendingInvoice()).toBeNull();
    });

    it('resolves the end date alias against the reference date', async () => {
      const draft = await invoiceManager.draftInvoice('yesterday', '2025-04-06');

      expect(draft.endDate).toBe('2025-04-05');
    });

    it('stores the pending invoice once rendering succeeded', async () => {
      const { draft, outputPath: writtenPath } = await invoiceManager.generateInvoice(
        '2025-04-05',
        outputPath,
        '2025-04-06'
      );

      expect(writtenPath).toBe(outputPath);
      expect(renderer.drafts).toEqual([draft]);
      expect(await dataManager.loadPendingInvoice()).toMatchObject({
        invoiceNumber: 1000,
        startDate: '2025-04-01',
        endDate: '2025-04-05',
        totalHours: 5.5,
        amount: 275,
        outputPath,
      });
    });

    it('stores nothing when rendering fails', async () => {
      renderer.fail = true;

      await expect(
        invoiceManager.generateInvoice('2025-04-05', outputPath, '2025-04-06')
      ).rejects.toThrow('render failed');

      expect(await dataManager.loadPendingInvoice()).toBeNull();
      expect(allocator.peekNext()).toBe(1000);
    });

    it('offers the same number again when an invoice is regenerated before confirming', async () => {
      const first = await invoiceManager.generateInvoice('2025-04-05', outputPath, '2025-04-06');
      const second = await invoiceManager.generateInvoice('2025-04-05', outputPath, '2025-04-06');

      expect(first.draft.invoiceNumber).toBe(1000);
      expect(second.draft.invoiceNumber).toBe(1000);
    });

    it('refuses to confirm without a generated invoice', async () => {
      await expect(invoiceManager.confirmInvoice('1000', '2025-04-07')).rejects.toThrow(
        NoPendingInvoiceError
      );
      expect(allocator.peekNext()).toBe(1000);
    });

    it('refuses to confirm a number other than the pending one', async () => {
      await invoiceManager.generateInvoice('2025-04-05', outputPath, '2025-04-06');

      await expect(invoiceManager.confirmInvoice('990', '2025-04-07')).rejects.toThrow(
        StaleInvoiceNumberError
      );
      expect(allocator.peekNext()).toBe(1000);
      expect(await dataManager.loadPendingInvoice()).not.toBeNull();
      expect(await invoiceManager.listInvoices()).toEqual([]);
    });

    describe('after confirming the first invoice', () => {
      beforeEach(async () => {
        await invoiceManager.generateInvoice('2025-04-05', outputPath, '2025-04-06');
      });

      it('records the invoice and advances the counter', async () => {
        const { invoice, nextNumber } = await invoiceManager.confirmInvoice(
          'INV-1000',
          '2025-04-07'
        );

        expect(invoice).toEqual({
          invoiceNumber: 1000,
          startDate: '2025-04-01',
          endDate: '2025-04-05',
          totalHours: 5.5,
          amount: 275,
          confirmedOn: '2025-04-07',
        });
        expect(nextNumber).toBe(1010);
        expect(allocator.peekNext()).toBe(1010);
        expect(await invoiceManager.listInvoices()).toEqual([invoice]);
        expect(await dataManager.loadPendingInvoice()).toBeNull();
      });

      it('starts the next invoice the day after the confirmed period', async () => {
        await invoiceManager.confirmInvoice('1000', '2025-04-07');

        const draft = await invoiceManager.draftInvoice('2025-04-30', '2025-04-30');

        expect(draft.invoiceNumber).toBe(1010);
        expect(draft.startDate).toBe('2025-04-06');
        expect(draft.entries.map((entry) => entry.date)).toEqual(['2025-04-10']);
        expect(draft.totalHours).toBe(1.5);
        expect(draft.amount).toBe(75);
      });

      it('reports an empty period', async () => {
        await invoiceManager.confirmInvoice('1000', '2025-04-07');

        await expect(invoiceManager.draftInvoice('2025-04-08', '2025-04-08')).rejects.toThrow(
          'No work hours recorded between 2025-04-06 and 2025-04-08'
        );
      });

      it('rejects an end date before the next period starts', async () => {
        await invoiceManager.confirmInvoice('1000', '2025-04-07');

        await expect(invoiceManager.draftInvoice('2025-04-03', '2025-04-08')).rejects.toThrow(
          InvalidRangeError
        );
      });

      it('regenerates a confirmed invoice without touching the counter', async () => {
        await invoiceManager.confirmInvoice('1000', '2025-04-07');

        const { draft } = await invoiceManager.regenerateInvoice('1000', outputPath);

        expect(draft.invoiceNumber).toBe(1000);
        expect(draft.issueDate).toBe('2025-04-07');
        expect(draft.totalHours).toBe(5.5);
        expect(allocator.peekNext()).toBe(1010);
      });

      it('refuses to confirm a number that was already confirmed', async () => {
        await invoiceManager.confirmInvoice('1000', '2025-04-07');
        config.invoice.nextNumber = 1000;
        await invoiceManager.generateInvoice('2025-04-30', outputPath, '2025-04-30');

        await expect(invoiceManager.confirmInvoice('1000', '2025-04-30')).rejects.toThrow(
          DuplicateInvoiceNumberError
        );
        expect(allocator.peekNext()).toBe(1000);
        expect(await invoiceManager.listInvoices()).toHaveLength(1);
      });

      it('cannot regenerate an unknown invoice', async () => {
        await invoiceManager.confirmInvoice('1000', '2025-04-07');

        await expect(invoiceManager.regenerateInvoice('2000', outputPath)).rejects.toThrow(
          InvoiceNotFoundError
        );
      });
    });
  });
});
