import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import dayjs from 'dayjs';
import { createObjectCsvStringifier } from 'csv-writer';
import { ReportRow } from '../models/user-identity';
import { ExportError, toError } from './base';
import { logger as rootLogger } from '../utils/logger';

export type ExportOutcome =
  | { status: 'skipped' }
  | { status: 'written'; filePath: string; rowCount: number }
  | { status: 'failed'; error: ExportError };

export interface ExportServiceOptions {
  now?: () => Date;
}

const CSV_HEADER = [
  { id: 'displayName', title: 'DisplayName' },
  { id: 'userPrincipalName', title: 'UserPrincipalName' },
  { id: 'id', title: 'ID' }
];

export function buildExportFilename(timestamp: Date): string {
  return `Users_Without_FIDO2_${dayjs(timestamp).format('YYYY-MM-DD_HHmm')}.csv`;
}

/**
 * Header line plus one line per row; an empty report is just the header
 */
export function serializeReportCsv(rows: readonly ReportRow[]): string {
  const csvStringifier = createObjectCsvStringifier({ header: CSV_HEADER });
  const header = csvStringifier.getHeaderString() ?? '';
  // stringifyRecords([]) still yields a line break, which readers take as an empty record
  if (rows.length === 0) {
    return header;
  }
  return header + csvStringifier.stringifyRecords(rows.map(row => ({ ...row })));
}

export class ExportService {
  private logger = rootLogger.child({ service: 'Export' });
  private readonly now: () => Date;

  constructor(options: ExportServiceOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Write the report to a timestamped CSV file in outputDir, creating the directory when missing.
   * Failures are returned, not thrown: the console report has already been shown.
   */
  async exportReport(rows: readonly ReportRow[], outputDir: string, enabled: boolean): Promise<ExportOutcome> {
    if (!enabled) {
      this.logger.debug('CSV export not requested');
      return { status: 'skipped' };
    }

    const filePath = path.join(outputDir, buildExportFilename(this.now()));

    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(filePath, serializeReportCsv(rows), 'utf-8');
    } catch (error) {
      const cause = toError(error);
      return {
        status: 'failed',
        error: new ExportError(`Failed to export report to ${filePath}: ${cause.message}`, outputDir, cause)
      };
    }

    this.logger.info(`Exported ${rows.length} row(s) to ${filePath}`);
    return { status: 'written', filePath, rowCount: rows.length };
  }
}
