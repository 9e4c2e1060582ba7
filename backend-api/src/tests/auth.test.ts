import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SignJWT } from 'jose';

import { signAccessToken, verifyAccessToken } from '../auth/jwt.js';
import { AuthRole, PermissionCode, defaultPermissionsForRole, hasPermission, isAuthRole } from '../auth/permissions.js';

const SECRET = 'test-secret-test-secret-test-secret';

describe('jwt', () => {
  const previous = process.env.MFT_JWT_SECRET;

  beforeEach(() => {
    process.env.MFT_JWT_SECRET = SECRET;
  });

  afterEach(() => {
    if (previous === undefined) delete process.env.MFT_JWT_SECRET;
    else process.env.MFT_JWT_SECRET = previous;
  });

  it('verifies the tokens it signs', async () => {
    const token = await signAccessToken({ id: 'u1', username: 'editor1', role: 'editor' });
    await expect(verifyAccessToken(token)).resolves.toEqual({ id: 'u1', username: 'editor1', role: 'editor' });
  });

  it('refuses a short secret', async () => {
    process.env.MFT_JWT_SECRET = 'short';
    await expect(signAccessToken({ id: 'u1', username: 'a', role: 'admin' })).rejects.toThrow(
      'MFT_JWT_SECRET is not configured (must be 32+ chars)',
    );
  });

  it('rejects an unknown role', async () => {
    const token = await new SignJWT({ sub: 'u1', username: 'root', role: 'superuser' })
      .setProtectedHeader({ alg: 'HS256' })
      .setIssuedAt()
      .setExpirationTime('1h')
      .sign(new TextEncoder().encode(SECRET));
    await expect(verifyAccessToken(token)).rejects.toThrow('Invalid token payload');
  });
});

describe('permissions', () => {
  it('gives viewers read access only', () => {
    expect(defaultPermissionsForRole(AuthRole.Viewer)).toEqual({
      [PermissionCode.LogisticsView]: true,
      [PermissionCode.LogisticsCreate]: false,
      [PermissionCode.LogisticsEdit]: false,
      [PermissionCode.LogisticsDelete]: false,
      [PermissionCode.BreakpointsView]: true,
      [PermissionCode.BreakpointsRecord]: false,
    });
  });

  it('lets editors write but not delete', () => {
    expect(hasPermission(AuthRole.Editor, PermissionCode.LogisticsCreate)).toBe(true);
    expect(hasPermission(AuthRole.Editor, PermissionCode.BreakpointsRecord)).toBe(true);
    expect(hasPermission(AuthRole.Editor, PermissionCode.LogisticsDelete)).toBe(false);
  });

  it('gives admins everything', () => {
    for (const code of Object.values(PermissionCode)) expect(hasPermission(AuthRole.Admin, code)).toBe(true);
  });

  it('recognizes the three roles', () => {
    expect(['admin', 'editor', 'viewer'].every(isAuthRole)).toBe(true);
    expect(isAuthRole('user')).toBe(false);
  });
});
