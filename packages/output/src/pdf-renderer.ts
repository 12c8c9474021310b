import PDFDocument from 'pdfkit';
import type { PdfBlock, PdfLayout } from './pdf-layout.js';

const REGULAR = 'Helvetica';
const BOLD = 'Helvetica-Bold';
const CELL_PADDING = 2;

function ensureRoom(doc: PDFKit.PDFDocument, height: number): void {
  if (doc.y + height > doc.page.height - doc.page.margins.bottom) {
    doc.addPage();
  }
}

function drawRow(
  doc: PDFKit.PDFDocument,
  columns: Extract<PdfBlock, { type: 'table' }>['columns'],
  cells: readonly string[],
  bold: boolean
): void {
  doc.font(bold ? BOLD : REGULAR).fontSize(8);
  const heights = columns.map((column, i) =>
    doc.heightOfString(cells[i] ?? '', { width: column.width - CELL_PADDING * 2 })
  );
  const rowHeight = Math.max(...heights, 0) + CELL_PADDING * 2;
  ensureRoom(doc, rowHeight);

  const top = doc.y;
  let x = doc.page.margins.left;
  columns.forEach((column, i) => {
    doc.text(cells[i] ?? '', x + CELL_PADDING, top + CELL_PADDING, {
      width: column.width - CELL_PADDING * 2,
      align: column.align,
    });
    x += column.width;
  });

  doc.x = doc.page.margins.left;
  doc.y = top + rowHeight;
}

function drawBlock(doc: PDFKit.PDFDocument, block: PdfBlock): void {
  switch (block.type) {
    case 'heading':
      ensureRoom(doc, 40);
      doc.moveDown(block.level === 1 ? 0 : 0.8);
      doc.font(BOLD).fontSize(block.level === 1 ? 16 : 12).text(block.text);
      doc.moveDown(0.3);
      break;
    case 'text':
      doc.font(REGULAR).fontSize(block.size).text(block.text);
      doc.moveDown(0.3);
      break;
    case 'keyValue':
      for (const entry of block.entries) {
        doc.font(BOLD).fontSize(10).text(`${entry.label}: `, { continued: true });
        doc.font(REGULAR).text(entry.value);
      }
      doc.moveDown(0.3);
      break;
    case 'table':
      drawRow(
        doc,
        block.columns,
        block.columns.map((column) => column.header),
        true
      );
      for (const row of block.rows) {
        drawRow(doc, block.columns, row.cells, row.bold);
      }
      doc.moveDown(0.5);
      break;
  }
}

/**
 * Draw a layout with pdfkit and collect the document into a Buffer.
 */
export function renderPdf(layout: PdfLayout): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({
      size: layout.size,
      margin: layout.margin,
      info: { Title: layout.title },
    });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    try {
      layout.blocks.forEach((block) => drawBlock(doc, block));
      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}
