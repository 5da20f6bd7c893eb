import path from 'path';
import {
  AuditConfiguration,
  AzureConfig,
  CliOverrides,
  ConfigValidationResult,
  DEFAULT_AUTHORITY_HOST,
  DEFAULT_OUTPUT_PATH,
  LOG_LEVELS,
  LogLevel
} from './types';
import { ConfigurationError } from '../services/base';
import { normalizeDomainSuffix } from '../utils/graph-utils';
import { logger } from '../utils/logger';

const PLACEHOLDER_VALUES = new Set([
  'placeholder-tenant-id',
  'placeholder-client-id',
  'placeholder-client-secret'
]);

/**
 * Configuration for one audit run.
 * Merges command-line flags over environment variables over defaults, then validates the result.
 */
export class ConfigurationService {
  private config: AuditConfiguration | null = null;
  private validationResult: ConfigValidationResult | null = null;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and validate configuration
   */
  initialize(overrides: CliOverrides = {}): ConfigValidationResult {
    this.config = this.loadConfiguration(overrides);
    this.validationResult = this.validateConfiguration(this.config, overrides);

    if (this.validationResult.warnings.length > 0) {
      logger.warn('Configuration validation warnings:', { warnings: this.validationResult.warnings });
    }

    return this.validationResult;
  }

  getConfig(): AuditConfiguration {
    if (!this.config) {
      throw new Error('Configuration not initialized. Call initialize() first.');
    }
    return this.config;
  }

  hasErrors(): boolean {
    return (this.validationResult?.errors.length ?? 0) > 0;
  }

  /**
   * The validation errors as one fatal error, or undefined when the configuration is usable
   */
  getValidationError(): ConfigurationError | undefined {
    const errors = this.validationResult?.errors ?? [];
    if (errors.length === 0) {
      return undefined;
    }
    return new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, errors);
  }

  private loadConfiguration(overrides: CliOverrides): AuditConfiguration {
    const outputPath = overrides.outputPath || this.readEnv('AUDIT_OUTPUT_PATH') || DEFAULT_OUTPUT_PATH;

    return {
      azure: this.loadAzureConfig(),
      audit: {
        exportCsv: overrides.exportCsv ?? false,
        outputPath: path.resolve(outputPath),
        domainFilter: normalizeDomainSuffix(overrides.domainFilter),
        showProgress: overrides.progress ?? true
      },
      logging: {
        level: this.parseLogLevel(overrides.logLevel ?? this.readEnv('LOG_LEVEL')) ?? 'warn',
        directory: this.readEnv('LOG_DIR')
      }
    };
  }

  private loadAzureConfig(): AzureConfig {
    const clientSecret = this.readEnv('AZURE_CLIENT_SECRET');

    return {
      tenantId: this.readEnv('AZURE_TENANT_ID') ?? '',
      clientId: this.readEnv('AZURE_CLIENT_ID') ?? '',
      clientSecret,
      authorityHost: (this.readEnv('AZURE_AUTHORITY_HOST') ?? DEFAULT_AUTHORITY_HOST).replace(/\/+$/, ''),
      authMode: clientSecret ? 'app-only' : 'delegated'
    };
  }

  private validateConfiguration(config: AuditConfiguration, overrides: CliOverrides): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!config.azure.tenantId) {
      errors.push('AZURE_TENANT_ID is not set');
    }

    if (!config.azure.clientId) {
      errors.push('AZURE_CLIENT_ID is not set');
    }

    const requestedLevel = overrides.logLevel ?? this.readEnv('LOG_LEVEL');
    if (requestedLevel !== undefined && this.parseLogLevel(requestedLevel) === undefined) {
      errors.push(`Unknown log level "${requestedLevel}" (expected one of ${LOG_LEVELS.join(', ')})`);
    }

    if (config.audit.domainFilter === '@') {
      errors.push('Domain filter must name a domain, e.g. contoso.com');
    }

    if (overrides.outputPath && !config.audit.exportCsv) {
      warnings.push('--output-path has no effect without --export-csv');
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  private parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) {
      return undefined;
    }
    const level = value.trim().toLowerCase();
    return LOG_LEVELS.find(candidate => candidate === level);
  }

  /**
   * Read a variable, treating blanks and placeholder values as unset
   */
  private readEnv(name: string): string | undefined {
    const value = this.env[name]?.trim();
    if (!value || PLACEHOLDER_VALUES.has(value)) {
      return undefined;
    }
    return value;
  }
}

