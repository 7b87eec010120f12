#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import Table from 'cli-table3';
import open from 'open';
import type { Config } from '../types.js';
import { loadEnv } from '../loadEnv.js';
import { ConfigManager } from '../config-manager.js';
import { SetupWizard } from '../setup-wizard.js';
import { DataManager } from '../data-manager.js';
import { HoursLedger } from '../hours-ledger.js';
import {
  SummaryManager,
  SUMMARY_PERIODS,
  isSummaryPeriod,
  parseSummaryWindow,
} from '../summary-manager.js';
import { InvoiceNumberAllocator } from '../invoice-number-allocator.js';
import { InvoiceManager } from '../invoice-manager.js';
import { InvoiceComposer, formatMoney } from '../invoice-composer.js';
import { isBillableError } from '../errors.js';
import { addDays, formatHours, today } from '../date-utils.js';
import { resolveDate } from '../date-resolver.js';

loadEnv();

const program = new Command();

async function ensureSetup(): Promise<{ config: Config; configManager: ConfigManager }> {
  const configManager = new ConfigManager();
  let config = await configManager.loadConfig();

  if (!config || !config.setupCompleted) {
    console.log(chalk.yellow("⚠️  Billable is not set up yet. Let's get started!"));
    const setupWizard = new SetupWizard(configManager);
    config = await setupWizard.runSetup(config);
  }

  return { config, configManager };
}

async function createServices() {
  const { config, configManager } = await ensureSetup();
  const dataManager = new DataManager(config);
  const ledger = await HoursLedger.load(dataManager);
  const allocator = new InvoiceNumberAllocator(config, configManager);
  const invoiceManager = new InvoiceManager(
    config,
    ledger,
    dataManager,
    allocator,
    new InvoiceComposer()
  );

  return {
    config,
    dataManager,
    ledger,
    allocator,
    invoiceManager,
    summaryManager: new SummaryManager(config, ledger),
  };
}

function reportError(context: string, error: unknown): void {
  if (isBillableError(error)) {
    console.log(chalk.red(`❌ ${context}: ${error.message}`));
  } else {
    console.log(chalk.red(`❌ ${context}:`), error);
  }
  process.exitCode = 1;
}

program
  .name('billable')
  .description('Log freelance work hours and generate PDF invoices')
  .version('1.0.0');

program
  .command('log <date> <hours> [description]')
  .description(
    'Record hours for a date (YYYY-MM-DD or today, tomorrow, yesterday, daybefore). Replaces any entry already logged for that date'
  )
  .action(async (date: string, hours: string, description?: string) => {
    try {
      const { config, ledger } = await createServices();
      const resolvedDate = resolveDate(date, today(config.timezone));
      const previous = ledger.getEntry(resolvedDate);
      const entry = await ledger.logHours(resolvedDate, hours, description);

      if (previous) {
        console.log(
          chalk.yellow(
            `↺ Replaced previous entry: ${formatHours(previous.hours)} hours on ${previous.date}`
          )
        );
      }
      console.log(
        chalk.green(
          `✅ Logged ${formatHours(entry.hours)} hours on ${entry.date}${entry.description ? ` - '${entry.description}'` : ''}`
        )
      );
    } catch (error) {
      reportError('Error logging work', error);
    }
  });

program
  .command('summary [period] [value]')
  .description(
    `Show hours for a ${SUMMARY_PERIODS.join('/')} (value: a date for day/week, YYYY-MM for month, YYYY for year)`
  )
  .option('--json', 'Print the summary as JSON')
  .action(
    async (period: string | undefined, value: string | undefined, options: { json?: boolean }) => {
      try {
        const selected = period ?? 'month';
        if (!isSummaryPeriod(selected)) {
          console.log(
            chalk.red(`❌ Unknown period "${selected}". Use one of: ${SUMMARY_PERIODS.join(', ')}`)
          );
          process.exitCode = 1;
          return;
        }

        const { config, summaryManager } = await createServices();
        const window = parseSummaryWindow(selected, value, today(config.timezone));

        if (options.json) {
          console.log(JSON.stringify(summaryManager.summarize(window), null, 2));
        } else {
          summaryManager.showSummary(window);
        }
      } catch (error) {
        reportError('Error showing summary', error);
      }
    }
  );

program
  .command('entries <start_date> <end_date>')
  .description('List logged entries between two dates (inclusive)')
  .action(async (startDate: string, endDate: string) => {
    try {
      const { config, summaryManager } = await createServices();
      const reference = today(config.timezone);
      summaryManager.showEntries(resolveDate(startDate, reference), resolveDate(endDate, reference));
    } catch (error) {
      reportError('Error listing entries', error);
    }
  });

const invoiceCommand = program.command('invoice').description('Generate and confirm invoices');

invoiceCommand
  .command('next')
  .description('Show the invoice number the next invoice will carry')
  .action(async () => {
    try {
      const { allocator } = await createServices();
      console.log(chalk.cyan(`Next invoice number: ${allocator.format(allocator.peekNext())}`));
    } catch (error) {
      reportError('Error reading invoice number', error);
    }
  });

invoiceCommand
  .command('generate [end_date]')
  .description(
    'Generate the next invoice, from the day after the last confirmed invoice up to end_date (defaults to today)'
  )
  .option('-o, --output <file>', 'Output PDF filename')
  .option('--open', 'Open the PDF once it is written')
  .action(async (endDate: string | undefined, options: { output?: string; open?: boolean }) => {
    try {
      const { config, allocator, invoiceManager } = await createServices();
      const outputPath = options.output ?? `${allocator.format(allocator.peekNext())}.pdf`;
      const { draft, outputPath: writtenPath } = await invoiceManager.generateInvoice(
        endDate,
        outputPath
      );

      console.log(chalk.green(`🧾 Invoice ${draft.formattedNumber} generated: ${writtenPath}`));
      console.log(chalk.cyan(`Period: ${draft.startDate} to ${draft.endDate}`));
      console.log(chalk.cyan(`Total hours: ${formatHours(draft.totalHours)}`));
      console.log(chalk.cyan(`Amount due: ${formatMoney(config.currencySymbol, draft.amount)}`));
      console.log(
        chalk.gray(`Once the invoice is sent, run: billable invoice confirm ${draft.invoiceNumber}`)
      );

      if (options.open) {
        await open(writtenPath);
      }
    } catch (error) {
      reportError('Error generating invoice', error);
    }
  });

invoiceCommand
  .command('confirm <invoice_number> [confirmation_date]')
  .description('Confirm the invoice generated last was sent (confirmation_date defaults to today)')
  .action(async (invoiceNumber: string, confirmationDate?: string) => {
    try {
      const { allocator, invoiceManager } = await createServices();
      const { invoice, nextNumber } = await invoiceManager.confirmInvoice(
        invoiceNumber,
        confirmationDate
      );

      console.log(
        chalk.green(
          `✅ Invoice ${allocator.format(invoice.invoiceNumber)} confirmed on ${invoice.confirmedOn}.`
        )
      );
      console.log(chalk.cyan(`Next invoice will start from ${addDays(invoice.endDate, 1)}.`));
      console.log(chalk.cyan(`Next invoice number: ${allocator.format(nextNumber)}`));
    } catch (error) {
      reportError('Error confirming invoice', error);
    }
  });

invoiceCommand
  .command('regenerate <invoice_number>')
  .description('Render a confirmed invoice again')
  .option('-o, --output <file>', 'Output PDF filename')
  .option('--open', 'Open the PDF once it is written')
  .action(async (invoiceNumber: string, options: { output?: string; open?: boolean }) => {
    try {
      const { allocator, invoiceManager } = await createServices();
      const outputPath =
        options.output ?? `${allocator.format(allocator.parse(invoiceNumber))}.pdf`;
      const { draft, outputPath: writtenPath } = await invoiceManager.regenerateInvoice(
        invoiceNumber,
        outputPath
      );

      console.log(chalk.green(`🧾 Invoice ${draft.formattedNumber} regenerated: ${writtenPath}`));
      console.log(chalk.cyan(`Period: ${draft.startDate} to ${draft.endDate}`));

      if (options.open) {
        await open(writtenPath);
      }
    } catch (error) {
      reportError('Error regenerating invoice', error);
    }
  });

invoiceCommand
  .command('list')
  .description('List confirmed invoices')
  .action(async () => {
    try {
      const { invoiceManager } = await createServices();
      await invoiceManager.showInvoices();
    } catch (error) {
      reportError('Error listing invoices', error);
    }
  });

program
  .command('setup')
  .description('Run the setup wizard again')
  .action(async () => {
    try {
      const configManager = new ConfigManager();
      const existing = await configManager.loadConfig();
      await new SetupWizard(configManager).runSetup(existing);
    } catch (error) {
      reportError('Error running setup', error);
    }
  });

program
  .command('whoami')
  .description('Show the current configuration')
  .action(async () => {
    try {
      const { config, dataManager, allocator } = await createServices();

      console.log(chalk.blue.bold('\n👤 Current Configuration\n'));

      const table = new Table({
        head: [chalk.cyan('Setting'), chalk.cyan('Value')],
        colWidths: [25, 60],
      });

      table.push(
        ['From', config.company.name],
        ['Billed to', config.client.name],
        ['Hourly rate', formatMoney(config.currencySymbol, config.hourlyRate)],
        ['Next invoice', allocator.format(allocator.peekNext())],
        ['Invoice increment', `${config.invoice.increment}`],
        ['Timezone', config.timezone],
        ['Data directory', config.dataDirectory],
        ['Config file', path.join(config.dataDirectory, '.billable', 'config.json')],
        ['Hour entries', dataManager.getLedgerPath()],
        ['Invoices', dataManager.getInvoicesPath()]
      );

      console.log(table.toString());
      console.log();
    } catch (error) {
      reportError('Error showing configuration', error);
    }
  });

// Handle unknown commands
program.on('command:*', () => {
  console.log(chalk.red('❌ Unknown command. Use "billable --help" to see available commands.'));
  process.exit(1);
});

// Show help if no command is provided
if (process.argv.length <= 2) {
  program.help();
}

await program.parseAsync(process.argv);
