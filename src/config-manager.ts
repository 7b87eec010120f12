import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import type { Config } from './types.js';
import { StorageIOError } from './errors.js';
import { getDataDirectory } from './helper/getDataDirectory.js';
import { writeFileAtomic } from './helper/atomicWrite.js';

const CONFIG_DIR_NAME = '.billable';

const partySchema = z.object({
  name: z.string(),
  address: z.string().optional(),
  email: z.string().optional(),
});

const invoiceSettingsSchema = z.object({
  prefix: z.string().default('INV-'),
  nextNumber: z.number().int().nonnegative().default(1000),
  increment: z.number().int().positive().default(10),
  paymentTermsDays: z.number().int().nonnegative().default(30),
  footerText: z.string().default('Thank you for your business!'),
});

// Missing keys in a stored config fall back to these defaults.
const configSchema = z.object({
  company: partySchema.default({ name: 'Your Company Name' }),
  client: partySchema.default({ name: 'Client Name' }),
  hourlyRate: z.number().positive().default(50),
  currencySymbol: z.string().default('$'),
  invoice: invoiceSettingsSchema.default({}),
  timezone: z.string().default(() => Intl.DateTimeFormat().resolvedOptions().timeZone),
  dataDirectory: z.string(),
  setupCompleted: z.boolean().default(false),
});

const globalConfigSchema = z.object({
  currentDataDirectory: z.string(),
});

/**
 * Persistence contract for the configuration. The invoice counter lives in the
 * config, so advancing it goes through here.
 */
export interface ConfigStore {
  saveConfig(config: Config): Promise<void>;
}

export class ConfigManager implements ConfigStore {
  private configPath: string;
  private globalConfigPath: string;

  constructor(dataDirectory?: string, globalConfigPath?: string) {
    // Use environment variable or default path
    const configBasePath =
      process.env.BILLABLE_CONFIG_PATH || path.join(os.homedir(), CONFIG_DIR_NAME);
    this.globalConfigPath = globalConfigPath ?? path.join(configBasePath, 'currentConfig.json');

    // Otherwise set after reading the global pointer
    this.configPath = dataDirectory ? this.configPathFor(dataDirectory) : '';
  }

  async loadConfig(): Promise<Config | null> {
    const currentDataDirectory = await this.getCurrentDataDirectory();
    if (currentDataDirectory) {
      this.configPath = this.configPathFor(currentDataDirectory);
    }

    if (!this.configPath) {
      return null;
    }

    let data: string;
    try {
      data = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null; // Config file doesn't exist
      }
      throw new StorageIOError('Failed to read configuration', this.configPath, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new StorageIOError('Configuration is not valid JSON', this.configPath, error);
    }

    const dataDirectory = path.dirname(path.dirname(this.configPath));
    const parsed = configSchema.safeParse(
      typeof json === 'object' && json !== null ? { dataDirectory, ...json } : json
    );
    if (!parsed.success) {
      throw new StorageIOError(
        'Configuration is malformed',
        this.configPath,
        parsed.error.flatten()
      );
    }
    return parsed.data;
  }

  async getCurrentDataDirectory(): Promise<string | null> {
    let data: string;
    try {
      data = await fs.readFile(this.globalConfigPath, 'utf-8');
    } catch {
      // No global config yet
      return null;
    }

    try {
      const parsed = globalConfigSchema.safeParse(JSON.parse(data));
      return parsed.success ? parsed.data.currentDataDirectory : null;
    } catch {
      return null;
    }
  }

  async setCurrentDataDirectory(dataDirectory: string): Promise<void> {
    const globalConfig = {
      currentDataDirectory: dataDirectory,
    };

    try {
      await writeFileAtomic(this.globalConfigPath, JSON.stringify(globalConfig, null, 2));
    } catch (error) {
      throw new StorageIOError('Failed to save global configuration', this.globalConfigPath, error);
    }
  }

  async saveConfig(config: Config): Promise<void> {
    // Point the global config at this data directory
    await this.setCurrentDataDirectory(config.dataDirectory);

    this.configPath = this.configPathFor(config.dataDirectory);
    try {
      await writeFileAtomic(this.configPath, JSON.stringify(config, null, 2));
    } catch (error) {
      throw new StorageIOError('Failed to save configuration', this.configPath, error);
    }
  }

  getDefaultConfig(): Config {
    return configSchema.parse({
      dataDirectory: getDataDirectory(process.env.BILLABLE_DATA_PATH),
    });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private configPathFor(dataDirectory: string): string {
    return path.join(dataDirectory, CONFIG_DIR_NAME, 'config.json');
  }
}
