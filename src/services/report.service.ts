import chalk from 'chalk';
import { ReportRow } from '../models/user-identity';
import { AuditSummary } from './method-auditor.service';

export const NO_FINDINGS_NOTICE = 'No users without a FIDO2 security key were found.';

const REPORT_COLUMNS: { key: keyof ReportRow; title: string }[] = [
  { key: 'displayName', title: 'DisplayName' },
  { key: 'userPrincipalName', title: 'UserPrincipalName' },
  { key: 'id', title: 'ID' }
];

const displayNameCollator = new Intl.Collator('en', { sensitivity: 'base' });

/**
 * Order rows by display name, ignoring case and accents.
 * Equal names keep their incoming order.
 */
export function sortReportRows(rows: readonly ReportRow[]): ReportRow[] {
  return [...rows].sort((a, b) => displayNameCollator.compare(a.displayName, b.displayName));
}

export interface ReportServiceOptions {
  write?: (line: string) => void;
  colors?: boolean;
}

export class ReportService {
  private readonly write: (line: string) => void;
  private readonly chalk: chalk.Chalk;

  constructor(options: ReportServiceOptions = {}) {
    this.write = options.write ?? (line => console.log(line));
    this.chalk = options.colors === false ? new chalk.Instance({ level: 0 }) : chalk;
  }

  render(rows: readonly ReportRow[]): void {
    if (rows.length === 0) {
      this.write(this.chalk.green(NO_FINDINGS_NOTICE));
      return;
    }

    this.write(this.chalk.yellow(`Users without a FIDO2 security key (${rows.length}):`));
    this.write('');
    for (const line of formatTable(sortReportRows(rows))) {
      this.write(line);
    }
  }

  renderSummary(summary: AuditSummary): void {
    const line = `Audited ${summary.total} user(s): ${summary.compliantCount} with FIDO2, ` +
      `${summary.rows.length} without, ${summary.failures.length} lookup(s) failed.`;
    this.write('');
    this.write(summary.failures.length > 0 ? this.chalk.yellow(line) : this.chalk.gray(line));
  }

  info(message: string): void {
    this.write(this.chalk.cyan(message));
  }
}

/**
 * Lay rows out as fixed-width columns under a dashed header
 */
export function formatTable(rows: readonly ReportRow[]): string[] {
  const widths = REPORT_COLUMNS.map(column =>
    Math.max(column.title.length, ...rows.map(row => row[column.key].length))
  );

  const formatLine = (cells: string[]): string =>
    cells.map((cell, index) => cell.padEnd(widths[index])).join(' ').trimEnd();

  return [
    formatLine(REPORT_COLUMNS.map(column => column.title)),
    formatLine(REPORT_COLUMNS.map(column => '-'.repeat(column.title.length))),
    ...rows.map(row => formatLine(REPORT_COLUMNS.map(column => row[column.key])))
  ];
}
