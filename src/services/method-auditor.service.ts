import { PerUserError, StageResult, failure, success, toError } from './base';
import { GraphSession } from './graph-session.service';
import { AuthenticationMethod, hasFido2Method, parseAuthenticationMethod } from '../models/authentication-method';
import { ReportRow, UserIdentity, toReportRow } from '../models/user-identity';
import { GRAPH_ENDPOINTS, describeGraphError, fetchAllPages } from '../utils/graph-utils';
import { logger as rootLogger } from '../utils/logger';

export interface AuditProgress {
  /** 1-based position of the user just processed */
  current: number;
  total: number;
  userPrincipalName: string;
}

export interface AuditUsersOptions {
  onProgress?: (progress: AuditProgress) => void;
  /** Called before the warning for a failed lookup is logged */
  onLookupFailed?: (error: PerUserError) => void;
}

export interface AuditSummary {
  /** Users with no FIDO2 security key, in retrieval order */
  rows: ReportRow[];
  compliantCount: number;
  failures: PerUserError[];
  total: number;
}

export class MethodAuditorService {
  private logger = rootLogger.child({ service: 'MethodAuditor' });

  async getAuthenticationMethods(session: GraphSession, user: UserIdentity): Promise<AuthenticationMethod[]> {
    const request = session.client.api(GRAPH_ENDPOINTS.USER_AUTH_METHODS(user.id));
    const resources = await fetchAllPages(session.client, request);
    return resources.map(parseAuthenticationMethod);
  }

  /**
   * Whether the user has no FIDO2 security key registered.
   * A lookup failure comes back as a PerUserError rather than a guess either way.
   */
  async lacksFido2(session: GraphSession, user: UserIdentity): Promise<StageResult<boolean, PerUserError>> {
    try {
      const methods = await this.getAuthenticationMethods(session, user);
      this.logger.debug(`${user.userPrincipalName}: ${methods.map(method => method.kind).join(', ') || 'no methods'}`);
      return success(!hasFido2Method(methods));
    } catch (error) {
      return failure(new PerUserError(
        `Failed to read authentication methods for ${user.userPrincipalName}: ${describeGraphError(error)}`,
        user.userPrincipalName,
        toError(error)
      ));
    }
  }

  /**
   * Check users one at a time. Failed lookups are warned about and left out of both outcomes.
   */
  async auditUsers(session: GraphSession, users: readonly UserIdentity[], options: AuditUsersOptions = {}): Promise<AuditSummary> {
    const summary: AuditSummary = {
      rows: [],
      compliantCount: 0,
      failures: [],
      total: users.length
    };

    for (const [index, user] of users.entries()) {
      const result = await this.lacksFido2(session, user);

      if (!result.ok) {
        options.onLookupFailed?.(result.error);
        this.logger.warn(result.error.message);
        summary.failures.push(result.error);
      } else if (result.value) {
        summary.rows.push(toReportRow(user));
      } else {
        summary.compliantCount++;
      }

      options.onProgress?.({
        current: index + 1,
        total: users.length,
        userPrincipalName: user.userPrincipalName
      });
    }

    return summary;
  }
}
