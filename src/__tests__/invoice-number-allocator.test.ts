import { describe, it, expect, beforeEach } from 'vitest';
import { InvoiceNumberAllocator } from '../invoice-number-allocator.js';
import { InvalidInvoiceNumberError, StaleInvoiceNumberError } from '../errors.js';
import type { Config } from '../types.js';
import { MemoryConfigStore, makeConfig } from './fixtures.js';

describe('InvoiceNumberAllocator', () => {
  let config: Config;
  let store: MemoryConfigStore;
  let allocator: InvoiceNumberAllocator;

  beforeEach(() => {
    config = makeConfig('/tmp/unused');
    store = new MemoryConfigStore();
    allocator = new InvoiceNumberAllocator(config, store);
  });

  it('offers the same number until it is confirmed', () => {
    expect(allocator.peekNext()).toBe(1000);
    expect(allocator.peekNext()).toBe(1000);
    expect(store.saves).toHaveLength(0);
  });

  it('advances by the increment on confirmation and persists the counter', async () => {
    expect(await allocator.confirm(1000)).toBe(1010);

    expect(allocator.peekNext()).toBe(1010);
    expect(config.invoice.nextNumber).toBe(1010);
    expect(store.saves).toHaveLength(1);
    expect(store.saves[0].invoice.nextNumber).toBe(1010);
  });

  it('runs N, N+10, N+20 across consecutive confirmations', async () => {
    await allocator.confirm(allocator.peekNext());
    await allocator.confirm(allocator.peekNext());

    expect(allocator.peekNext()).toBe(1020);
  });

  it('rejects a stale number', async () => {
    await expect(allocator.confirm(990)).rejects.toThrow(StaleInvoiceNumberError);
    await expect(allocator.confirm(990)).rejects.toThrow(
      'Invoice number 990 cannot be confirmed, the current invoice number is 1000'
    );
    expect(allocator.peekNext()).toBe(1000);
    expect(store.saves).toHaveLength(0);
  });

  it('cannot confirm the same number twice', async () => {
    await allocator.confirm(1000);

    await expect(allocator.confirm(1000)).rejects.toThrow(StaleInvoiceNumberError);
    expect(allocator.peekNext()).toBe(1010);
  });

  it('keeps the counter when the config cannot be saved', async () => {
    store.failSave = true;

    await expect(allocator.confirm(1000)).rejects.toThrow('disk full');
    expect(allocator.peekNext()).toBe(1000);
  });

  describe('format', () => {
    it('pads to four digits behind the prefix', () => {
      expect(allocator.format(1000)).toBe('INV-1000');
      expect(allocator.format(7)).toBe('INV-0007');
      expect(allocator.format(12345)).toBe('INV-12345');
    });
  });

  describe('parse', () => {
    it('accepts bare and prefixed numbers', () => {
      expect(allocator.parse('1020')).toBe(1020);
      expect(allocator.parse('INV-1000')).toBe(1000);
      expect(allocator.parse('inv-1010')).toBe(1010);
    });

    it('rejects anything else', () => {
      expect(() => allocator.parse('INV-')).toThrow(InvalidInvoiceNumberError);
      expect(() => allocator.parse('12a')).toThrow(InvalidInvoiceNumberError);
      expect(() => allocator.parse('-5')).toThrow(InvalidInvoiceNumberError);
    });
  });
});
