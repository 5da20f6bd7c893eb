import {
  AccountInfo,
  AuthenticationResult,
  ConfidentialClientApplication,
  Configuration,
  LogLevel as MsalLogLevel,
  PublicClientApplication
} from '@azure/msal-node';
import { AuthMode, AzureConfig } from '../config/types';
import { logger } from '../utils/logger';

export const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default';

export interface TokenProvider {
  readonly authMode: AuthMode;
  getAccessToken(): Promise<string>;
  clearCache(): Promise<void>;
}

export type DeviceCodeHandler = (message: string) => void;

function buildMsalSystemOptions(): Configuration['system'] {
  return {
    loggerOptions: {
      loggerCallback: (_level, message, containsPii) => {
        if (!containsPii) {
          logger.debug(`MSAL: ${message}`);
        }
      },
      piiLoggingEnabled: false,
      logLevel: MsalLogLevel.Info
    }
  };
}

function requireResult(response: AuthenticationResult | null, flow: string): AuthenticationResult {
  if (!response || !response.accessToken) {
    throw new Error(`No response from MSAL ${flow} flow`);
  }
  return response;
}

/**
 * App-only tokens through the client credentials flow.
 * Application permissions are granted on the app registration, so the request always asks for `.default`.
 */
export class ClientCredentialTokenProvider implements TokenProvider {
  readonly authMode = 'app-only' as const;
  private msalClient: ConfidentialClientApplication;

  constructor(config: AzureConfig) {
    this.msalClient = new ConfidentialClientApplication({
      auth: {
        clientId: config.clientId,
        authority: `${config.authorityHost}/${config.tenantId}`,
        clientSecret: config.clientSecret
      },
      system: buildMsalSystemOptions()
    });
  }

  async getAccessToken(): Promise<string> {
    const response = await this.msalClient.acquireTokenByClientCredential({
      scopes: [GRAPH_DEFAULT_SCOPE],
      skipCache: false
    });
    return requireResult(response, 'client credential').accessToken;
  }

  async clearCache(): Promise<void> {
    this.msalClient.clearCache();
  }
}

/**
 * Delegated tokens for an operator signing in with a device code.
 * The first call prompts; later calls are served silently for the same account.
 */
export class DeviceCodeTokenProvider implements TokenProvider {
  readonly authMode = 'delegated' as const;
  private msalClient: PublicClientApplication;
  private account: AccountInfo | null = null;

  constructor(
    config: AzureConfig,
    private readonly scopes: string[],
    private readonly onDeviceCode: DeviceCodeHandler
  ) {
    this.msalClient = new PublicClientApplication({
      auth: {
        clientId: config.clientId,
        authority: `${config.authorityHost}/${config.tenantId}`
      },
      system: buildMsalSystemOptions()
    });
  }

  async getAccessToken(): Promise<string> {
    if (this.account) {
      const silent = await this.msalClient.acquireTokenSilent({
        account: this.account,
        scopes: this.scopes
      });
      return requireResult(silent, 'silent').accessToken;
    }

    const response = requireResult(
      await this.msalClient.acquireTokenByDeviceCode({
        scopes: this.scopes,
        deviceCodeCallback: deviceCode => this.onDeviceCode(deviceCode.message)
      }),
      'device code'
    );
    this.account = response.account;
    logger.info('Delegated token acquired', { account: response.account?.username });
    return response.accessToken;
  }

  async clearCache(): Promise<void> {
    const tokenCache = this.msalClient.getTokenCache();
    const accounts = await tokenCache.getAllAccounts();
    for (const account of accounts) {
      await tokenCache.removeAccount(account);
    }
    this.account = null;
  }
}

export function createTokenProvider(
  config: AzureConfig,
  scopes: string[],
  onDeviceCode: DeviceCodeHandler
): TokenProvider {
  if (config.authMode === 'app-only') {
    return new ClientCredentialTokenProvider(config);
  }
  return new DeviceCodeTokenProvider(config, scopes, onDeviceCode);
}
