import { Client } from '@microsoft/microsoft-graph-client';
import { AuthMode, AzureConfig } from '../config/types';
import { AuthenticationError, StageResult, failure, success, toError } from './base';
import { GraphClientLike } from '../utils/graph-utils';
import { logger as rootLogger } from '../utils/logger';
import { DeviceCodeHandler, TokenProvider, createTokenProvider } from './msal-token-provider.service';

/** Read access to users and to their registered authentication methods. */
export const AUDIT_SCOPES: readonly string[] = ['User.Read.All', 'UserAuthenticationMethod.Read.All'];

export interface GraphSession {
  client: GraphClientLike;
  authMode: AuthMode;
  scopes: readonly string[];
  /** Clears cached tokens. Safe to call more than once; only the first call acts. */
  release(): Promise<void>;
}

export interface GraphSessionOptions {
  onDeviceCode?: DeviceCodeHandler;
  debugLogging?: boolean;
  createTokenProvider?: (config: AzureConfig, scopes: string[], onDeviceCode: DeviceCodeHandler) => TokenProvider;
}

export class GraphSessionService {
  private logger = rootLogger.child({ service: 'GraphSession' });

  constructor(
    private readonly config: AzureConfig,
    private readonly options: GraphSessionOptions = {}
  ) {}

  /**
   * Authenticate once and hand back a Graph client bound to that identity.
   * A single attempt is made; any failure is fatal to the run.
   */
  async establishSession(scopes: readonly string[] = AUDIT_SCOPES): Promise<StageResult<GraphSession, AuthenticationError>> {
    if (!this.config.tenantId || !this.config.clientId) {
      return failure(new AuthenticationError('Azure tenant id and client id are required to sign in'));
    }

    const onDeviceCode = this.options.onDeviceCode ?? ((message: string) => this.logger.warn(message));
    const factory = this.options.createTokenProvider ?? createTokenProvider;

    let provider: TokenProvider;
    try {
      provider = factory(this.config, [...scopes], onDeviceCode);
      await provider.getAccessToken();
    } catch (error) {
      const cause = toError(error);
      return failure(new AuthenticationError(
        `Failed to authenticate to Microsoft Graph (${this.config.authMode}) for tenant ${this.config.tenantId}: ${cause.message}`,
        cause
      ));
    }

    const client = Client.init({
      authProvider: done => {
        provider.getAccessToken().then(
          token => done(null, token),
          error => done(toError(error), null)
        );
      },
      defaultVersion: 'v1.0',
      debugLogging: this.options.debugLogging ?? false
    });

    this.logger.info(`Microsoft Graph session established (${provider.authMode} auth)`);

    return success(this.createSession(client, provider, scopes));
  }

  private createSession(client: GraphClientLike, provider: TokenProvider, scopes: readonly string[]): GraphSession {
    let released = false;
    const sessionLogger = this.logger;

    return {
      client,
      authMode: provider.authMode,
      scopes,
      async release(): Promise<void> {
        if (released) {
          return;
        }
        released = true;
        try {
          await provider.clearCache();
          sessionLogger.info('Microsoft Graph session released');
        } catch (error) {
          sessionLogger.warn(`Failed to release Microsoft Graph session: ${toError(error).message}`);
        }
      }
    };
  }
}
