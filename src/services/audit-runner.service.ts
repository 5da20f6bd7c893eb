import { AuditOptions } from '../config/types';
import { ReportRow } from '../models/user-identity';
import { DataSourceError } from './base';
import { ExportOutcome, ExportService } from './export.service';
import { AUDIT_SCOPES, GraphSessionService } from './graph-session.service';
import { AuditSummary, AuditUsersOptions, MethodAuditorService } from './method-auditor.service';
import { ReportService, sortReportRows } from './report.service';
import { UserListerService } from './user-lister.service';
import { logger as rootLogger } from '../utils/logger';

export interface AuditRunnerDependencies {
  sessionService: Pick<GraphSessionService, 'establishSession'>;
  userLister: UserListerService;
  methodAuditor: MethodAuditorService;
  reporter: ReportService;
  exporter: ExportService;
}

export interface AuditRunOptions extends Omit<AuditOptions, 'showProgress'>, AuditUsersOptions {}

export type AuditRunResult =
  | {
      exitCode: 0;
      rows: ReportRow[];
      summary: AuditSummary;
      exportOutcome: ExportOutcome;
    }
  | {
      exitCode: 1;
      error: DataSourceError;
    };

/**
 * Runs the audit pipeline once: sign in, list users, check each user's
 * methods, report, export. Only sign-in and listing failures abort the run.
 */
export class AuditRunner {
  private logger = rootLogger.child({ service: 'AuditRunner' });

  constructor(private readonly deps: AuditRunnerDependencies) {}

  async run(options: AuditRunOptions): Promise<AuditRunResult> {
    const { sessionService, userLister, methodAuditor, reporter, exporter } = this.deps;

    const sessionResult = await sessionService.establishSession(AUDIT_SCOPES);
    if (!sessionResult.ok) {
      this.logger.error(sessionResult.error.message);
      return { exitCode: 1, error: sessionResult.error };
    }

    const session = sessionResult.value;
    try {
      const usersResult = await userLister.listUsers(session, options.domainFilter);
      if (!usersResult.ok) {
        this.logger.error(usersResult.error.message);
        return { exitCode: 1, error: usersResult.error };
      }

      const users = usersResult.value;
      if (users.length === 0) {
        this.logger.warn(options.domainFilter
          ? `No users found with a principal name ending in ${options.domainFilter}`
          : 'No users found in the directory');
      }

      const summary = await methodAuditor.auditUsers(session, users, {
        onProgress: options.onProgress,
        onLookupFailed: options.onLookupFailed
      });
      const rows = sortReportRows(summary.rows);

      reporter.render(rows);
      reporter.renderSummary(summary);

      const exportOutcome = await exporter.exportReport(rows, options.outputPath, options.exportCsv);
      switch (exportOutcome.status) {
        case 'written':
          reporter.info(`Report exported to ${exportOutcome.filePath}`);
          break;
        case 'skipped':
          reporter.info('CSV export skipped (pass --export-csv to write a file).');
          break;
        case 'failed':
          this.logger.error(exportOutcome.error.message, { outputPath: exportOutcome.error.outputPath });
          break;
      }

      return { exitCode: 0, rows, summary, exportOutcome };
    } finally {
      await session.release();
    }
  }
}
