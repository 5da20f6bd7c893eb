import { UserListerService } from './user-lister.service';
import { FakeGraphClient, createTestSession, graphError } from '../test/fake-graph-client';

describe('UserListerService', () => {
  const service = new UserListerService();

  it('should list every user without a filter', async () => {
    const client = new FakeGraphClient().reply('/users', {
      value: [
        { id: 'u-1', displayName: 'Amy', userPrincipalName: 'amy@contoso.com' },
        { id: 'u-2', displayName: 'Bob', userPrincipalName: 'bob@fabrikam.com' }
      ]
    });

    const result = await service.listUsers(createTestSession(client));

    expect(result).toEqual({
      ok: true,
      value: [
        { id: 'u-1', displayName: 'Amy', userPrincipalName: 'amy@contoso.com' },
        { id: 'u-2', displayName: 'Bob', userPrincipalName: 'bob@fabrikam.com' }
      ]
    });
    expect(client.requests[0]).toEqual({
      path: '/users',
      select: 'id,displayName,userPrincipalName',
      top: 999,
      headers: {}
    });
  });

  it('should push the domain suffix to Graph as an advanced query', async () => {
    const client = new FakeGraphClient().reply('/users', { value: [] });

    await service.listUsers(createTestSession(client), 'contoso.com');

    expect(client.requests[0]).toEqual({
      path: '/users',
      filter: "endswith(userPrincipalName,'@contoso.com')",
      select: 'id,displayName,userPrincipalName',
      top: 999,
      count: true,
      headers: { ConsistencyLevel: 'eventual' }
    });
  });

  it('should send the same query for filters with and without @', async () => {
    const withoutAt = new FakeGraphClient().reply('/users', { value: [] });
    const withAt = new FakeGraphClient().reply('/users', { value: [] });

    await service.listUsers(createTestSession(withoutAt), 'contoso.com');
    await service.listUsers(createTestSession(withAt), '@contoso.com');

    expect(withAt.requests[0].filter).toBe(withoutAt.requests[0].filter);
  });

  it('should follow pagination until all users are read', async () => {
    const page2 = 'https://graph.microsoft.com/v1.0/users?$skiptoken=p2';
    const page3 = 'https://graph.microsoft.com/v1.0/users?$skiptoken=p3';
    const client = new FakeGraphClient()
      .reply('/users', {
        value: [{ id: 'u-1', displayName: 'A', userPrincipalName: 'a@contoso.com' }],
        '@odata.nextLink': page2
      })
      .reply(page2, {
        value: [{ id: 'u-2', displayName: 'B', userPrincipalName: 'b@contoso.com' }],
        '@odata.nextLink': page3
      })
      .reply(page3, {
        value: [{ id: 'u-3', displayName: 'C', userPrincipalName: 'c@contoso.com' }]
      });

    const result = await service.listUsers(createTestSession(client), 'contoso.com');

    expect(result.ok && result.value.map(user => user.id)).toEqual(['u-1', 'u-2', 'u-3']);
    expect(client.requests[2].headers).toEqual({ ConsistencyLevel: 'eventual' });
  });

  it('should return an empty list when nothing matches', async () => {
    const client = new FakeGraphClient().reply('/users', { value: [] });

    await expect(service.listUsers(createTestSession(client), 'nowhere.example')).resolves.toEqual({ ok: true, value: [] });
  });

  it('should skip records without a principal name', async () => {
    const client = new FakeGraphClient().reply('/users', {
      value: [
        { id: 'u-1', displayName: 'Amy', userPrincipalName: 'amy@contoso.com' },
        { id: 'u-2', displayName: 'Broken' }
      ]
    });

    const result = await service.listUsers(createTestSession(client));

    expect(result.ok && result.value).toEqual([{ id: 'u-1', displayName: 'Amy', userPrincipalName: 'amy@contoso.com' }]);
  });

  it('should return a DirectoryError when listing fails', async () => {
    const client = new FakeGraphClient().fail('/users', graphError(403, 'Authorization_RequestDenied', 'Insufficient privileges'));

    const result = await service.listUsers(createTestSession(client), 'contoso.com');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.name).toBe('DirectoryError');
      expect(result.error.message).toBe(
        'Failed to list users ending with @contoso.com: Insufficient permissions to perform this operation: Insufficient privileges (Authorization_RequestDenied, HTTP 403)'
      );
      expect(result.error.cause?.message).toBe('Insufficient privileges');
    }
  });
});
