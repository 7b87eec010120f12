import type { Config } from './types.js';
import type { ConfigStore } from './config-manager.js';
import { InvalidInvoiceNumberError, StaleInvoiceNumberError } from './errors.js';

/**
 * Hands out sequential invoice numbers in two phases.
 *
 * `peekNext` offers the current number without changing anything, so it can be
 * printed on an invoice that may still fail to render. `confirm` consumes the
 * number only once the caller knows the invoice went out. An offer that is
 * never confirmed is simply offered again next time; only `nextNumber` is
 * persisted.
 */
export class InvoiceNumberAllocator {
  private config: Config;
  private store: ConfigStore;

  constructor(config: Config, store: ConfigStore) {
    this.config = config;
    this.store = store;
  }

  peekNext(): number {
    return this.config.invoice.nextNumber;
  }

  /**
   * Consumes `expectedNumber` and returns the new next number.
   * @throws StaleInvoiceNumberError when `expectedNumber` isn't the number on offer
   */
  async confirm(expectedNumber: number): Promise<number> {
    const current = this.config.invoice.nextNumber;
    if (expectedNumber !== current) {
      throw new StaleInvoiceNumberError(expectedNumber, current);
    }

    const nextNumber = current + this.config.invoice.increment;
    await this.store.saveConfig({
      ...this.config,
      invoice: { ...this.config.invoice, nextNumber },
    });

    // Only touch the shared config once the new counter is on disk
    this.config.invoice.nextNumber = nextNumber;
    return nextNumber;
  }

  format(invoiceNumber: number): string {
    return `${this.config.invoice.prefix}${String(invoiceNumber).padStart(4, '0')}`;
  }

  /**
   * Accepts a bare number (`1000`) or one carrying the configured prefix (`INV-1000`).
   */
  parse(token: string): number {
    const { prefix } = this.config.invoice;
    const trimmed = token.trim();
    const digits =
      prefix && trimmed.toUpperCase().startsWith(prefix.toUpperCase())
        ? trimmed.slice(prefix.length)
        : trimmed;

    if (!/^\d+$/.test(digits)) {
      throw new InvalidInvoiceNumberError(token);
    }
    return parseInt(digits, 10);
  }
}
