import { parseUserIdentity, toReportRow } from './user-identity';

describe('parseUserIdentity', () => {
  it('should read id, display name and principal name', () => {
    expect(parseUserIdentity({
      id: 'u-1',
      displayName: 'Amy Adams',
      userPrincipalName: 'amy@contoso.com',
      mail: 'amy@contoso.com'
    })).toEqual({ id: 'u-1', displayName: 'Amy Adams', userPrincipalName: 'amy@contoso.com' });
  });

  it('should read a null display name as empty', () => {
    expect(parseUserIdentity({ id: 'u-2', displayName: null, userPrincipalName: 'svc@contoso.com' }))
      .toEqual({ id: 'u-2', displayName: '', userPrincipalName: 'svc@contoso.com' });
  });

  it('should reject records without id or principal name', () => {
    expect(parseUserIdentity({ displayName: 'No Id', userPrincipalName: 'x@contoso.com' })).toBeNull();
    expect(parseUserIdentity({ id: 'u-3', displayName: 'No UPN' })).toBeNull();
    expect(parseUserIdentity(null)).toBeNull();
  });
});

describe('toReportRow', () => {
  it('should project the report columns', () => {
    expect(toReportRow({ id: 'u-1', displayName: 'Amy', userPrincipalName: 'amy@contoso.com' }))
      .toEqual({ displayName: 'Amy', userPrincipalName: 'amy@contoso.com', id: 'u-1' });
  });
});
