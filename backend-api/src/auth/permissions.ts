// Roles of the logistics database: viewer reads, editor writes, admin also deletes.

export const AuthRole = {
  Admin: 'admin',
  Editor: 'editor',
  Viewer: 'viewer',
} as const;

export type AuthRole = (typeof AuthRole)[keyof typeof AuthRole];

export const PermissionCode = {
  LogisticsView: 'logistics.view',
  LogisticsCreate: 'logistics.create',
  LogisticsEdit: 'logistics.edit',
  LogisticsDelete: 'logistics.delete',

  BreakpointsView: 'breakpoints.view',
  BreakpointsRecord: 'breakpoints.record',
} as const;

export type PermissionCode = (typeof PermissionCode)[keyof typeof PermissionCode];

export function isAuthRole(v: unknown): v is AuthRole {
  return Object.values(AuthRole).some((r) => r === v);
}

export function defaultPermissionsForRole(role: AuthRole): Record<PermissionCode, boolean> {
  const none: Record<PermissionCode, boolean> = {
    [PermissionCode.LogisticsView]: false,
    [PermissionCode.LogisticsCreate]: false,
    [PermissionCode.LogisticsEdit]: false,
    [PermissionCode.LogisticsDelete]: false,
    [PermissionCode.BreakpointsView]: false,
    [PermissionCode.BreakpointsRecord]: false,
  };

  if (role === AuthRole.Admin) {
    const all = { ...none };
    for (const code of Object.values(PermissionCode)) all[code] = true;
    return all;
  }

  if (role === AuthRole.Editor) {
    return {
      ...none,
      [PermissionCode.LogisticsView]: true,
      [PermissionCode.LogisticsCreate]: true,
      [PermissionCode.LogisticsEdit]: true,
      [PermissionCode.BreakpointsView]: true,
      [PermissionCode.BreakpointsRecord]: true,
    };
  }

  // viewer
  return {
    ...none,
    [PermissionCode.LogisticsView]: true,
    [PermissionCode.BreakpointsView]: true,
  };
}

export function hasPermission(role: AuthRole, code: PermissionCode): boolean {
  return defaultPermissionsForRole(role)[code];
}
