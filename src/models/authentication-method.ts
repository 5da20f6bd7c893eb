import { isRecord } from '../utils/graph-utils';

interface MethodBase {
  id: string;
}

export interface PasswordMethod extends MethodBase {
  kind: 'password';
  createdDateTime?: string;
}

export interface PhoneMethod extends MethodBase {
  kind: 'phone';
  phoneNumber?: string;
  phoneType?: string;
}

export interface EmailMethod extends MethodBase {
  kind: 'email';
  emailAddress?: string;
}

export interface Fido2Method extends MethodBase {
  kind: 'fido2';
  displayName?: string;
  model?: string;
  aaGuid?: string;
}

export interface WindowsHelloForBusinessMethod extends MethodBase {
  kind: 'windowsHelloForBusiness';
  displayName?: string;
}

export interface MicrosoftAuthenticatorMethod extends MethodBase {
  kind: 'microsoftAuthenticator';
  displayName?: string;
  deviceTag?: string;
}

export interface SoftwareOathMethod extends MethodBase {
  kind: 'softwareOath';
}

export interface TemporaryAccessPassMethod extends MethodBase {
  kind: 'temporaryAccessPass';
  isUsable?: boolean;
}

export interface PlatformCredentialMethod extends MethodBase {
  kind: 'platformCredential';
  displayName?: string;
  platform?: string;
}

/** Any method type this tool does not know about; keeps the raw discriminant. */
export interface OtherMethod extends MethodBase {
  kind: 'other';
  odataType: string;
}

export type AuthenticationMethod =
  | PasswordMethod
  | PhoneMethod
  | EmailMethod
  | Fido2Method
  | WindowsHelloForBusinessMethod
  | MicrosoftAuthenticatorMethod
  | SoftwareOathMethod
  | TemporaryAccessPassMethod
  | PlatformCredentialMethod
  | OtherMethod;

export const FIDO2_ODATA_TYPE = '#microsoft.graph.fido2AuthenticationMethod';

function optionalString(resource: Record<string, unknown>, key: string): string | undefined {
  const value = resource[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map a Graph authenticationMethod resource onto the tagged union using its `@odata.type`.
 */
export function parseAuthenticationMethod(resource: unknown): AuthenticationMethod {
  if (!isRecord(resource)) {
    return { kind: 'other', id: '', odataType: '' };
  }

  const id = optionalString(resource, 'id') ?? '';
  const odataType = optionalString(resource, '@odata.type') ?? '';

  switch (odataType) {
    case '#microsoft.graph.passwordAuthenticationMethod':
      return { kind: 'password', id, createdDateTime: optionalString(resource, 'createdDateTime') };
    case '#microsoft.graph.phoneAuthenticationMethod':
      return {
        kind: 'phone',
        id,
        phoneNumber: optionalString(resource, 'phoneNumber'),
        phoneType: optionalString(resource, 'phoneType')
      };
    case '#microsoft.graph.emailAuthenticationMethod':
      return { kind: 'email', id, emailAddress: optionalString(resource, 'emailAddress') };
    case FIDO2_ODATA_TYPE:
      return {
        kind: 'fido2',
        id,
        displayName: optionalString(resource, 'displayName'),
        model: optionalString(resource, 'model'),
        aaGuid: optionalString(resource, 'aaGuid')
      };
    case '#microsoft.graph.windowsHelloForBusinessAuthenticationMethod':
      return { kind: 'windowsHelloForBusiness', id, displayName: optionalString(resource, 'displayName') };
    case '#microsoft.graph.microsoftAuthenticatorAuthenticationMethod':
      return {
        kind: 'microsoftAuthenticator',
        id,
        displayName: optionalString(resource, 'displayName'),
        deviceTag: optionalString(resource, 'deviceTag')
      };
    case '#microsoft.graph.softwareOathAuthenticationMethod':
      return { kind: 'softwareOath', id };
    case '#microsoft.graph.temporaryAccessPassAuthenticationMethod': {
      const isUsable = resource.isUsable;
      return { kind: 'temporaryAccessPass', id, isUsable: typeof isUsable === 'boolean' ? isUsable : undefined };
    }
    case '#microsoft.graph.platformCredentialAuthenticationMethod':
      return {
        kind: 'platformCredential',
        id,
        displayName: optionalString(resource, 'displayName'),
        platform: optionalString(resource, 'platform')
      };
    default:
      return { kind: 'other', id, odataType };
  }
}

export function hasFido2Method(methods: readonly AuthenticationMethod[]): boolean {
  return methods.some(method => method.kind === 'fido2');
}
