/**
 * Error types raised by the ledger and invoicing core.
 * The command layer turns these into a one-line message and a non-zero exit code.
 */

export class BillableError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidDateError extends BillableError {
  constructor(public readonly token: string) {
    super(
      `Invalid date "${token}". Use YYYY-MM-DD or one of: today, tomorrow, yesterday, daybefore`,
      'INVALID_DATE',
      { token }
    );
  }
}

export class InvalidHoursError extends BillableError {
  constructor(public readonly value: unknown) {
    super(`Invalid hours "${String(value)}". Hours must be a positive number`, 'INVALID_HOURS', {
      value,
    });
  }
}

export class InvalidRangeError extends BillableError {
  constructor(
    public readonly startDate: string,
    public readonly endDate: string
  ) {
    super(`Start date ${startDate} is after end date ${endDate}`, 'INVALID_RANGE', {
      startDate,
      endDate,
    });
  }
}

/**
 * Raised when a confirmation does not match the invoice number currently on offer.
 */
export class StaleInvoiceNumberError extends BillableError {
  constructor(
    public readonly expected: number,
    public readonly current: number
  ) {
    super(
      `Invoice number ${expected} cannot be confirmed, the current invoice number is ${current}`,
      'STALE_INVOICE_NUMBER',
      { expected, current }
    );
  }
}

export class InvalidInvoiceNumberError extends BillableError {
  constructor(public readonly token: string) {
    super(`Invalid invoice number "${token}"`, 'INVALID_INVOICE_NUMBER', { token });
  }
}

export class NothingToInvoiceError extends BillableError {
  constructor(startDate?: string, endDate?: string) {
    super(
      startDate && endDate
        ? `No work hours recorded between ${startDate} and ${endDate}`
        : 'No work hours recorded',
      'NOTHING_TO_INVOICE',
      { startDate, endDate }
    );
  }
}

export class NoPendingInvoiceError extends BillableError {
  constructor() {
    super(
      'No unconfirmed invoice found. Generate an invoice before confirming it',
      'NO_PENDING_INVOICE'
    );
  }
}

export class DuplicateInvoiceNumberError extends BillableError {
  constructor(public readonly invoiceNumber: number) {
    super(
      `Invoice ${invoiceNumber} has already been confirmed`,
      'DUPLICATE_INVOICE_NUMBER',
      { invoiceNumber }
    );
  }
}

export class InvoiceNotFoundError extends BillableError {
  constructor(public readonly invoiceNumber: number) {
    super(`Invoice ${invoiceNumber} not found in confirmed invoices`, 'INVOICE_NOT_FOUND', {
      invoiceNumber,
    });
  }
}

/**
 * Storage failures are propagated as-is to the caller, never retried.
 */
export class StorageIOError extends BillableError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(`${message} (${filePath})`, 'STORAGE_IO', { filePath, cause });
  }
}

export function isBillableError(error: unknown): error is BillableError {
  return error instanceof BillableError;
}
