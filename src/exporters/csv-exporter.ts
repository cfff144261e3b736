/**
 * CSV checkpoints for a collection run: an intermediate file once every seller is
 * fetched and a final file once every seller is classified.
 */

import { createReadStream, promises as fs } from 'node:fs';
import path from 'node:path';
import csv from 'csv-parser';
import { type ExportRow, fromLabel, toLabel } from '../types/collection';
import { ExportError, toError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';

export const CSV_HEADERS = ['セラー名', 'セラーページURL', '二次創作'] as const;

const BOM = '\uFEFF';
const FILE_PREFIX = 'sellers_';

export interface Exporter {
  /** Rows of a run whose classification has not started; returns the written path */
  exportIntermediate(rows: ExportRow[]): Promise<string>;
  exportFinal(rows: ExportRow[]): Promise<string>;
}

export interface CsvExporterOptions {
  outputDir: string;
  now?: () => Date;
  logger?: Logger;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Quote a field when it holds a separator, a quote or a line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(rows: ExportRow[]): string {
  const lines = [
    CSV_HEADERS.join(','),
    ...rows.map((row) =>
      [row.entityName, row.entityLocator, row.label].map(escapeCsvField).join(',')
    )
  ];
  return `${BOM}${lines.join('\n')}\n`;
}

export class CsvExporter implements Exporter {
  private readonly outputDir: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: CsvExporterOptions) {
    this.outputDir = options.outputDir;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? getLogger()).child({ service: 'csv-exporter' });
  }

  async exportIntermediate(rows: ExportRow[]): Promise<string> {
    return this.write(rows, '', 'Intermediate export written');
  }

  async exportFinal(rows: ExportRow[]): Promise<string> {
    return this.write(rows, '_final', 'Final export written');
  }

  filePathFor(suffix: string): string {
    return path.join(this.outputDir, `${FILE_PREFIX}${formatTimestamp(this.now())}${suffix}.csv`);
  }

  private async write(rows: ExportRow[], suffix: string, message: string): Promise<string> {
    const filePath = this.filePathFor(suffix);

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(filePath, toCsv(rows), 'utf8');
    } catch (error) {
      const cause = toError(error);
      this.logger.error('CSV write failed', cause, { filePath });
      throw new ExportError(filePath, cause.message);
    }

    this.logger.info(`${message}: ${filePath}`, { rows: rows.length });
    return filePath;
  }
}

/**
 * Read an export back. Labels are checked against the known set.
 */
export async function readExport(filePath: string): Promise<ExportRow[]> {
  const records: Array<Record<string, string>> = [];

  await new Promise<void>((resolve, reject) => {
    createReadStream(filePath)
      .on('error', reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim() }))
      .on('data', (record: Record<string, string>) => records.push(record))
      .on('end', resolve)
      .on('error', reject);
  });

  const [nameColumn, locatorColumn, labelColumn] = CSV_HEADERS;

  return records.map((record) => ({
    entityName: record[nameColumn] ?? '',
    entityLocator: record[locatorColumn] ?? '',
    label: toLabel(fromLabel(record[labelColumn] ?? ''))
  }));
}
