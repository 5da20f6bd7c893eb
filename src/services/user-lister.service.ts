import { DirectoryError, StageResult, failure, success, toError } from './base';
import { GraphSession } from './graph-session.service';
import { UserIdentity, parseUserIdentity } from '../models/user-identity';
import {
  GRAPH_ENDPOINTS,
  GRAPH_MAX_PAGE_SIZE,
  GRAPH_SELECT_FIELDS,
  GraphQueryOptions,
  buildEndsWithFilter,
  buildGraphRequest,
  describeGraphError,
  fetchAllPages,
  normalizeDomainSuffix
} from '../utils/graph-utils';
import { logger as rootLogger } from '../utils/logger';

export class UserListerService {
  private logger = rootLogger.child({ service: 'UserLister' });

  /**
   * Fetch every user, or only those whose principal name ends with the
   * domain suffix. The suffix is applied by Graph, not client-side.
   */
  async listUsers(session: GraphSession, domainFilter?: string): Promise<StageResult<UserIdentity[], DirectoryError>> {
    const suffix = normalizeDomainSuffix(domainFilter);
    const options = this.buildQueryOptions(suffix);
    const request = buildGraphRequest(session.client.api(GRAPH_ENDPOINTS.USERS), options);
    const headers: Record<string, string> = options.count ? { ConsistencyLevel: 'eventual' } : {};

    let resources: unknown[];
    try {
      resources = await fetchAllPages(session.client, request, headers);
    } catch (error) {
      const scope = suffix ? `users ending with ${suffix}` : 'users';
      return failure(new DirectoryError(`Failed to list ${scope}: ${describeGraphError(error)}`, toError(error)));
    }

    const users: UserIdentity[] = [];
    for (const resource of resources) {
      const user = parseUserIdentity(resource);
      if (user) {
        users.push(user);
      } else {
        this.logger.debug('Skipping user record without id or userPrincipalName');
      }
    }

    this.logger.info(`Retrieved ${users.length} user(s)${suffix ? ` matching ${suffix}` : ''}`);
    return success(users);
  }

  private buildQueryOptions(suffix: string | undefined): GraphQueryOptions {
    const options: GraphQueryOptions = {
      select: GRAPH_SELECT_FIELDS.USER,
      top: GRAPH_MAX_PAGE_SIZE
    };

    if (suffix) {
      options.filter = buildEndsWithFilter('userPrincipalName', suffix);
      // endswith is only served as an advanced query
      options.count = true;
    }

    return options;
  }
}
