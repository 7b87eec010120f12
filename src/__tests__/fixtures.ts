import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Config, HourEntry } from '../types.js';
import type { LedgerStore } from '../data-manager.js';
import type { ConfigStore } from '../config-manager.js';

export function makeConfig(dataDirectory: string, overrides: Partial<Config> = {}): Config {
  return {
    company: { name: 'Test Studio', address: 'Main Street 1', email: 'billing@example.com' },
    client: { name: 'Client Co' },
    hourlyRate: 50,
    currencySymbol: '$',
    invoice: {
      prefix: 'INV-',
      nextNumber: 1000,
      increment: 10,
      paymentTermsDays: 30,
      footerText: 'Thank you for your business!',
    },
    timezone: 'UTC',
    dataDirectory,
    setupCompleted: true,
    ...overrides,
  };
}

export function makeEntry(date: string, hours: number, description?: string): HourEntry {
  const entry: HourEntry = { date, hours, loggedAt: `${date}T18:00:00.000Z` };
  if (description) {
    entry.description = description;
  }
  return entry;
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'billable-test-'));
}

export class MemoryLedgerStore implements LedgerStore {
  saves: HourEntry[][] = [];
  failSave = false;
  private entries: HourEntry[];

  constructor(entries: HourEntry[] = []) {
    this.entries = entries;
  }

  async loadLedger(): Promise<HourEntry[]> {
    return [...this.entries];
  }

  async saveLedger(entries: HourEntry[]): Promise<void> {
    if (this.failSave) {
      throw new Error('disk full');
    }
    this.entries = entries;
    this.saves.push(entries);
  }
}

export class MemoryConfigStore implements ConfigStore {
  saves: Config[] = [];
  failSave = false;

  async saveConfig(config: Config): Promise<void> {
    if (this.failSave) {
      throw new Error('disk full');
    }
    this.saves.push(config);
  }
}
