/**
 * Configuration Types and Interfaces
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type AuthMode = 'app-only' | 'delegated';

export interface AzureConfig {
  tenantId: string;
  clientId: string;
  clientSecret?: string;
  authorityHost: string;
  authMode: AuthMode;
}

export interface AuditOptions {
  exportCsv: boolean;
  outputPath: string;
  domainFilter?: string;
  showProgress: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  directory?: string;
}

export interface AuditConfiguration {
  azure: AzureConfig;
  audit: AuditOptions;
  logging: LoggingConfig;
}

/**
 * Values supplied on the command line. Anything left undefined falls back
 * to the environment, then to defaults.
 */
export interface CliOverrides {
  exportCsv?: boolean;
  outputPath?: string;
  domainFilter?: string;
  logLevel?: string;
  progress?: boolean;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export const DEFAULT_OUTPUT_PATH = './reports';
export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';
