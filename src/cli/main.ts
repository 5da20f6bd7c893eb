import { CommanderError } from 'commander';
import { config as loadEnv } from 'dotenv';
import { ConfigurationService } from '../config/config.service';
import { CliOverrides } from '../config/types';
import { AuditRunner } from '../services/audit-runner.service';
import { ExportService } from '../services/export.service';
import { GraphSessionService } from '../services/graph-session.service';
import { MethodAuditorService } from '../services/method-auditor.service';
import { ReportService } from '../services/report.service';
import { UserListerService } from '../services/user-lister.service';
import { configureLogger, logger } from '../utils/logger';
import { createProgressRenderer } from './progress';
import { parseCliArguments } from './program';

/**
 * Entry point for one run. Resolves to the process exit code.
 */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  loadEnv();

  let overrides: CliOverrides;
  try {
    overrides = parseCliArguments(argv);
  } catch (error) {
    // --help and --version also end up here
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const configService = new ConfigurationService(env);
  configService.initialize(overrides);
  const config = configService.getConfig();
  configureLogger(config.logging);

  const configError = configService.getValidationError();
  if (configError) {
    logger.error(configError.message, { code: configError.code, problems: configError.problems });
    return 1;
  }

  const progress = config.audit.showProgress ? createProgressRenderer(process.stderr) : undefined;

  const runner = new AuditRunner({
    sessionService: new GraphSessionService(config.azure, {
      onDeviceCode: message => process.stderr.write(`${message}\n`),
      debugLogging: config.logging.level === 'debug'
    }),
    userLister: new UserListerService(),
    methodAuditor: new MethodAuditorService(),
    reporter: new ReportService(),
    exporter: new ExportService()
  });

  const result = await runner.run({
    exportCsv: config.audit.exportCsv,
    outputPath: config.audit.outputPath,
    domainFilter: config.audit.domainFilter,
    onProgress: progress?.update,
    onLookupFailed: progress?.interrupt
  });

  if (result.exitCode !== 0) {
    logger.debug('Audit aborted', { code: result.error.code });
  }
  return result.exitCode;
}
