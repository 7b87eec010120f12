import path from 'path';
import { jsPDF } from 'jspdf';
import type { InvoiceDraft, Party } from './types.js';
import { formatHours } from './date-utils.js';
import { writeFileAtomic } from './helper/atomicWrite.js';

/**
 * Turns a priced invoice draft into a file. Resolves to the absolute path
 * written; rejects when nothing usable was written.
 */
export interface InvoiceRenderer {
  render(draft: InvoiceDraft, outputPath: string): Promise<string>;
}

const MARGIN_X = 14;
const RIGHT_X = 196;
const PAGE_BOTTOM = 275;
const ROW_HEIGHT = 7;

const COLUMNS = {
  date: MARGIN_X,
  description: 42,
  hours: 160,
  amount: RIGHT_X,
};

export function formatMoney(currencySymbol: string, amount: number): string {
  return `${currencySymbol}${amount.toFixed(2)}`;
}

function partyLines(party: Party): string[] {
  return [party.name, party.address, party.email].filter(
    (line): line is string => typeof line === 'string' && line.trim().length > 0
  );
}

export class InvoiceComposer implements InvoiceRenderer {
  async render(draft: InvoiceDraft, outputPath: string): Promise<string> {
    const doc = this.buildDocument(draft);
    const resolvedPath = path.resolve(outputPath);
    await writeFileAtomic(resolvedPath, new Uint8Array(doc.output('arraybuffer')));
    return resolvedPath;
  }

  buildDocument(draft: InvoiceDraft): jsPDF {
    const doc = new jsPDF();
    doc.setFont('helvetica');

    // Header
    doc.setFontSize(20);
    doc.text('INVOICE', MARGIN_X, 22);

    doc.setFontSize(10);
    doc.text(`Number: ${draft.formattedNumber}`, 140, 18);
    doc.text(`Date of issue: ${draft.issueDate}`, 140, 24);
    doc.text(`Due date: ${draft.dueDate}`, 140, 30);

    // Parties and period
    doc.setFont('helvetica', 'bold');
    doc.text('BILLED TO', MARGIN_X, 45);
    doc.text('FROM', 80, 45);
    doc.text('PERIOD', 140, 45);
    doc.setFont('helvetica', 'normal');
    doc.text(partyLines(draft.client), MARGIN_X, 51);
    doc.text(partyLines(draft.company), 80, 51);
    doc.text(`${draft.startDate} to ${draft.endDate}`, 140, 51);

    // Work summary
    let y = 80;
    doc.setFontSize(11);
    doc.setFont('helvetica', 'bold');
    doc.text('WORK SUMMARY', MARGIN_X, y);
    y += 6;
    y = this.drawTableHeader(doc, y);

    doc.setFont('helvetica', 'normal');
    for (const entry of draft.entries) {
      const descriptionLines: string[] = doc.splitTextToSize(
        entry.description ?? '',
        COLUMNS.hours - COLUMNS.description - 20
      );
      const rowHeight = Math.max(1, descriptionLines.length) * 5 + 2;

      if (y + rowHeight > PAGE_BOTTOM) {
        doc.addPage();
        y = this.drawTableHeader(doc, 20);
        doc.setFont('helvetica', 'normal');
      }

      doc.text(entry.date, COLUMNS.date, y);
      doc.text(descriptionLines, COLUMNS.description, y);
      doc.text(formatHours(entry.hours), COLUMNS.hours, y, { align: 'right' });
      const lineAmount = formatMoney(draft.currencySymbol, entry.hours * draft.hourlyRate);
      doc.text(lineAmount, COLUMNS.amount, y, { align: 'right' });
      y += rowHeight;
    }

    doc.setDrawColor(0, 0, 0);
    doc.line(MARGIN_X, y - 3, RIGHT_X, y - 3);
    doc.setFont('helvetica', 'bold');
    doc.text('TOTAL', COLUMNS.date, y + 2);
    doc.text(formatHours(draft.totalHours), COLUMNS.hours, y + 2, { align: 'right' });
    doc.text(formatMoney(draft.currencySymbol, draft.amount), COLUMNS.amount, y + 2, {
      align: 'right',
    });

    // Payment details
    y += 20;
    if (y + 30 > PAGE_BOTTOM) {
      doc.addPage();
      y = 20;
    }
    doc.text('PAYMENT DETAILS', MARGIN_X, y);
    doc.setFont('helvetica', 'normal');
    doc.text('Hourly rate:', MARGIN_X, y + 8);
    doc.text(`${formatMoney(draft.currencySymbol, draft.hourlyRate)}/h`, 80, y + 8);
    doc.setFont('helvetica', 'bold');
    doc.text('Total amount due:', MARGIN_X, y + 15);
    doc.text(formatMoney(draft.currencySymbol, draft.amount), 80, y + 15);

    // Footer
    doc.setFont('helvetica', 'normal');
    doc.setFontSize(8);
    doc.setTextColor(100, 100, 100);
    doc.text(draft.footerText, 105, 287, { align: 'center' });

    return doc;
  }

  private drawTableHeader(doc: jsPDF, y: number): number {
    doc.setFontSize(10);
    doc.setFont('helvetica', 'bold');
    doc.setFillColor(240, 240, 240);
    doc.rect(MARGIN_X - 2, y - 5, RIGHT_X - MARGIN_X + 4, ROW_HEIGHT, 'F');
    doc.text('Date', COLUMNS.date, y);
    doc.text('Description', COLUMNS.description, y);
    doc.text('Hours', COLUMNS.hours, y, { align: 'right' });
    doc.text('Amount', COLUMNS.amount, y, { align: 'right' });
    return y + ROW_HEIGHT + 2;
  }
}
