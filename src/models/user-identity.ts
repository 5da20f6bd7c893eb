import { isRecord } from '../utils/graph-utils';

export interface UserIdentity {
  id: string;
  displayName: string;
  userPrincipalName: string;
}

/**
 * A user that has no FIDO2 security key registered
 */
export interface ReportRow {
  displayName: string;
  userPrincipalName: string;
  id: string;
}

/**
 * Read a Graph user resource. Returns null when the id or principal name is missing.
 */
export function parseUserIdentity(resource: unknown): UserIdentity | null {
  if (!isRecord(resource)) {
    return null;
  }

  const { id, displayName, userPrincipalName } = resource;
  if (typeof id !== 'string' || !id || typeof userPrincipalName !== 'string' || !userPrincipalName) {
    return null;
  }

  return {
    id,
    displayName: typeof displayName === 'string' ? displayName : '',
    userPrincipalName
  };
}

export function toReportRow(user: UserIdentity): ReportRow {
  return {
    displayName: user.displayName,
    userPrincipalName: user.userPrincipalName,
    id: user.id
  };
}
