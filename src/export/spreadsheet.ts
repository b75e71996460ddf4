import { rename, rm } from 'fs/promises';
import * as path from 'path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import type { Product } from '../scrapers/base.js';
import { ExportError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

export const SHEET_NAME = 'Products';
export const LINK_TEXT = 'View Product';
export const HEADERS = ['Product Name', 'Price', 'Site', 'Link'] as const;

// Codes a destination held open by another program fails with
const LOCKED_CODES = new Set(['EBUSY', 'EPERM', 'EACCES']);

export type WorkbookWriter = (workbook: Workbook, file: string) => Promise<void>;

export interface SpreadsheetExporterOptions {
  filenamePrefix?: string;
  outputDir?: string;
  logger?: Logger;
  writeWorkbook?: WorkbookWriter;
  now?: () => Date;
}

/**
 * Writes `file` by way of a temporary sibling that is renamed into place, so
 * a failed write never leaves a truncated file at `file`.
 */
export async function replaceFile(file: string, write: (tempFile: string) => Promise<void>): Promise<void> {
  const tempFile = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
  try {
    await write(tempFile);
    await rename(tempFile, file);
  } catch (error) {
    await rm(tempFile, { force: true });
    throw error;
  }
}

const writeXlsx: WorkbookWriter = (workbook, file) =>
  replaceFile(file, (tempFile) => workbook.xlsx.writeFile(tempFile));

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

// 20240501_130405
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function isLockedError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return typeof error.code === 'string' && LOCKED_CODES.has(error.code);
}

export function alternateFileName(file: string): string {
  const ext = path.extname(file);
  return `${file.slice(0, file.length - ext.length)}_new${ext}`;
}

export function buildWorkbook(products: readonly Product[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);

  sheet.addRow([...HEADERS]);
  sheet.getRow(1).font = { bold: true };

  for (const product of products) {
    const row = sheet.addRow([product.name, product.price, product.site, null]);
    const link = row.getCell(4);
    link.value = { text: LINK_TEXT, hyperlink: product.url };
    link.font = { color: { argb: 'FF0563C1' }, underline: true };
  }

  // Widest cell text + 2, header included
  HEADERS.forEach((header, index) => {
    const column = sheet.getColumn(index + 1);
    let width = header.length;
    column.eachCell({ includeEmpty: false }, (cell) => {
      width = Math.max(width, cell.text.length);
    });
    column.width = width + 2;
  });

  return workbook;
}

/**
 * Writes search results to an .xlsx workbook, one row per product with a
 * clickable link. Refuses to write an empty workbook.
 */
export class SpreadsheetExporter {
  private readonly filenamePrefix: string;
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly writeWorkbook: WorkbookWriter;
  private readonly now: () => Date;

  constructor(options: SpreadsheetExporterOptions = {}) {
    this.filenamePrefix = options.filenamePrefix ?? 'price_comparison';
    this.outputDir = options.outputDir ?? '.';
    this.logger = options.logger ?? silentLogger;
    this.writeWorkbook = options.writeWorkbook ?? writeXlsx;
    this.now = options.now ?? (() => new Date());
  }

  defaultFileName(query: string): string {
    const stem = query.trim().replace(/ /g, '_');
    return path.join(this.outputDir, `${stem}_${fileTimestamp(this.now())}_${this.filenamePrefix}.xlsx`);
  }

  async export(products: readonly Product[], query: string, outputFile?: string): Promise<string> {
    if (products.length === 0) {
      throw new ExportError('No products to export');
    }

    const workbook = buildWorkbook(products);
    const target = outputFile ?? this.defaultFileName(query);

    try {
      await this.writeWorkbook(workbook, target);
      this.logger.info(`Successfully saved ${products.length} products to ${target}`);
      return target;
    } catch (error) {
      if (!isLockedError(error)) {
        throw new ExportError(`Failed to save spreadsheet ${target}: ${describeError(error)}`, { cause: error });
      }
    }

    const fallback = alternateFileName(target);
    this.logger.warn(`Original file was locked, saving as: ${fallback}`);
    try {
      await this.writeWorkbook(workbook, fallback);
    } catch (error) {
      throw new ExportError(`Failed to save spreadsheet ${fallback}: ${describeError(error)}`, { cause: error });
    }
    this.logger.info(`Successfully saved ${products.length} products to ${fallback}`);
    return fallback;
  }
}
