export interface Party {
  name: string;
  address?: string;
  email?: string;
}

export interface InvoiceSettings {
  prefix: string; // e.g. 'INV-'
  nextNumber: number;
  increment: number;
  paymentTermsDays: number;
  footerText: string;
}

export interface Config {
  company: Party;
  client: Party;
  hourlyRate: number;
  currencySymbol: string;
  invoice: InvoiceSettings;
  timezone: string;
  dataDirectory: string;
  setupCompleted: boolean;
}

export interface HourEntry {
  date: string; // ISO date string (YYYY-MM-DD)
  hours: number;
  description?: string;
  loggedAt: string; // ISO datetime string
}

export type SummaryWindow =
  | { kind: 'day'; date: string }
  | { kind: 'week'; date: string }
  | { kind: 'month'; year: number; month: number } // month is 1-12
  | { kind: 'year'; year: number };

export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface SummaryResult extends DateRange {
  window: SummaryWindow;
  totalHours: number;
  entries: HourEntry[];
}

export interface PendingInvoice extends DateRange {
  invoiceNumber: number;
  totalHours: number;
  amount: number;
  outputPath: string;
  generatedAt: string; // ISO datetime string
}

export interface ConfirmedInvoice extends DateRange {
  invoiceNumber: number;
  totalHours: number;
  amount: number;
  confirmedOn: string; // ISO date string
}

export interface InvoiceDraft extends DateRange {
  invoiceNumber: number;
  formattedNumber: string;
  issueDate: string;
  dueDate: string;
  entries: HourEntry[];
  totalHours: number;
  hourlyRate: number;
  amount: number;
  currencySymbol: string;
  company: Party;
  client: Party;
  footerText: string;
}
