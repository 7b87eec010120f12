import inquirer from 'inquirer';
import chalk from 'chalk';

import type { Config } from './types.js';
import { ConfigManager } from './config-manager.js';

type SetupAnswers = {
  companyName: string;
  companyAddress: string;
  companyEmail: string;
  clientName: string;
  clientAddress: string;
  hourlyRate: number;
  currencySymbol: string;
  invoicePrefix: string;
};

function optional(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export class SetupWizard {
  private configManager: ConfigManager;

  constructor(configManager: ConfigManager = new ConfigManager()) {
    this.configManager = configManager;
  }

  async runSetup(existing?: Config | null): Promise<Config> {
    console.log(chalk.blue.bold('\n🧾 Welcome to Billable Setup!\n'));
    console.log(chalk.gray("Let's configure your invoicing details.\n"));

    const base = existing ?? this.configManager.getDefaultConfig();

    for (;;) {
      const config = await this.collectUserInput(base);
      // The counter only moves through confirmation once invoices exist
      if (!existing) {
        config.invoice.nextNumber = await this.collectStartingNumber(base.invoice.nextNumber);
      }

      console.log(chalk.yellow('\n📋 Setup Summary:'));
      this.displaySummary(config);

      const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
        {
          type: 'confirm',
          name: 'confirmed',
          message: 'Is this configuration correct?',
          default: true,
        },
      ]);

      if (confirmed) {
        config.setupCompleted = true;
        await this.configManager.saveConfig(config);
        console.log(chalk.green.bold('\n✅ Setup completed successfully!\n'));
        return config;
      }

      console.log(chalk.yellow("\n🔄 Let's start over...\n"));
    }
  }

  private async collectUserInput(base: Config): Promise<Config> {
    const answers = await inquirer.prompt<SetupAnswers>([
      {
        type: 'input',
        name: 'companyName',
        message: 'Your name or company name (shown as FROM on invoices):',
        default: base.company.name,
        validate: (input: string) => input.trim().length > 0 || 'Name cannot be empty',
      },
      {
        type: 'input',
        name: 'companyAddress',
        message: 'Your address (optional):',
        default: base.company.address ?? '',
      },
      {
        type: 'input',
        name: 'companyEmail',
        message: 'Your email (optional):',
        default: base.company.email ?? '',
      },
      {
        type: 'input',
        name: 'clientName',
        message: 'Client name (shown as BILLED TO on invoices):',
        default: base.client.name,
        validate: (input: string) => input.trim().length > 0 || 'Client name cannot be empty',
      },
      {
        type: 'input',
        name: 'clientAddress',
        message: 'Client address (optional):',
        default: base.client.address ?? '',
      },
      {
        type: 'number',
        name: 'hourlyRate',
        message: 'Hourly rate:',
        default: base.hourlyRate,
        validate: (input: number) =>
          (Number.isFinite(input) && input > 0) || 'Please enter a positive hourly rate',
      },
      {
        type: 'input',
        name: 'currencySymbol',
        message: 'Currency symbol:',
        default: base.currencySymbol,
      },
      {
        type: 'input',
        name: 'invoicePrefix',
        message: 'Invoice number prefix:',
        default: base.invoice.prefix,
      },
    ]);

    const timezone = await this.collectTimezone(base.timezone);

    return {
      ...base,
      company: {
        name: answers.companyName.trim(),
        address: optional(answers.companyAddress),
        email: optional(answers.companyEmail),
      },
      client: {
        name: answers.clientName.trim(),
        address: optional(answers.clientAddress),
      },
      hourlyRate: answers.hourlyRate,
      currencySymbol: answers.currencySymbol,
      invoice: {
        ...base.invoice,
        prefix: answers.invoicePrefix,
      },
      timezone,
      setupCompleted: false,
    };
  }

  private async collectStartingNumber(current: number): Promise<number> {
    const { nextNumber } = await inquirer.prompt<{ nextNumber: number }>([
      {
        type: 'number',
        name: 'nextNumber',
        message: 'First invoice number:',
        default: current,
        validate: (input: number) =>
          (Number.isInteger(input) && input >= 0) || 'Please enter a whole number',
      },
    ]);
    return nextNumber;
  }

  private async collectTimezone(current: string): Promise<string> {
    console.log(chalk.blue('\n🌍 Configure your timezone:'));

    const commonTimezones = [
      { name: 'Europe/Berlin (GMT+1/+2)', value: 'Europe/Berlin' },
      { name: 'Europe/London (GMT+0/+1)', value: 'Europe/London' },
      { name: 'America/New_York (EST/EDT)', value: 'America/New_York' },
      { name: 'America/Los_Angeles (PST/PDT)', value: 'America/Los_Angeles' },
      { name: 'Asia/Tokyo (JST)', value: 'Asia/Tokyo' },
      { name: 'Australia/Sydney (AEST/AEDT)', value: 'Australia/Sydney' },
      { name: 'UTC (Coordinated Universal Time)', value: 'UTC' },
      { name: 'Custom timezone...', value: 'custom' },
    ];

    const { timezone } = await inquirer.prompt<{ timezone: string }>([
      {
        type: 'list',
        name: 'timezone',
        message: 'Select your timezone:',
        choices: commonTimezones,
        default: commonTimezones.some((choice) => choice.value === current) ? current : 'UTC',
      },
    ]);

    if (timezone === 'custom') {
      const { customTimezone } = await inquirer.prompt<{ customTimezone: string }>([
        {
          type: 'input',
          name: 'customTimezone',
          message: 'Enter your timezone (e.g., Europe/Berlin, America/New_York):',
          default: current,
          validate: (input: string) => {
            const timezoneRegex = /^[A-Za-z_]+\/[A-Za-z_]+$/;
            return (
              timezoneRegex.test(input) || input === 'UTC' || 'Please enter a valid timezone format'
            );
          },
        },
      ]);
      return customTimezone;
    }

    return timezone;
  }

  private displaySummary(config: Config): void {
    console.log(`${chalk.cyan('From:')} ${config.company.name}`);
    console.log(`${chalk.cyan('Billed to:')} ${config.client.name}`);
    console.log(
      `${chalk.cyan('Hourly rate:')} ${config.currencySymbol}${config.hourlyRate.toFixed(2)}`
    );
    console.log(
      `${chalk.cyan('Next invoice:')} ${config.invoice.prefix}${String(config.invoice.nextNumber).padStart(4, '0')}`
    );
    console.log(`${chalk.cyan('Timezone:')} ${config.timezone}`);
    console.log(`${chalk.cyan('Data directory:')} ${config.dataDirectory}`);
  }
}
