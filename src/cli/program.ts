import { Command } from 'commander';
import { CliOverrides, DEFAULT_OUTPUT_PATH, LOG_LEVELS } from '../config/types';

interface CliFlags {
  exportCsv?: boolean;
  outputPath?: string;
  domainFilter?: string;
  logLevel?: string;
  progress: boolean;
}

export function createProgram(): Command {
  return new Command()
    .name('fido2-audit')
    .description('Report Entra ID users that have no FIDO2 security key (passkey) registered')
    .option('--export-csv', 'write the report to a timestamped CSV file')
    .option('--output-path <dir>', `directory for the CSV export (default: AUDIT_OUTPUT_PATH or ${DEFAULT_OUTPUT_PATH})`)
    .option('--domain-filter <domain>', 'only audit users whose principal name ends with this domain')
    .option('--log-level <level>', `log verbosity: ${LOG_LEVELS.join(', ')}`)
    .option('--no-progress', 'do not show per-user progress')
    .exitOverride();
}

/**
 * Parse argv into the overrides the configuration layer understands
 */
export function parseCliArguments(argv: readonly string[], program: Command = createProgram()): CliOverrides {
  program.parse([...argv]);
  const flags = program.opts<CliFlags>();

  return {
    exportCsv: flags.exportCsv === true,
    outputPath: flags.outputPath,
    domainFilter: flags.domainFilter,
    logLevel: flags.logLevel,
    progress: flags.progress
  };
}
