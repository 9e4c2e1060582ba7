import type { NextFunction, Request, Response } from 'express';

import type { AuthUser } from './jwt.js';
import { verifyAccessToken } from './jwt.js';
import { hasPermission, type PermissionCode } from './permissions.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

function extractBearerToken(req: Request): string | null {
  const raw = req.header('authorization') ?? '';
  const m = raw.match(/^Bearer\s+(.+)$/i);
  const token = m?.[1];
  return token ? token.trim() : null;
}

export async function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = extractBearerToken(req);
  if (!token) return res.status(401).json({ ok: false, error: 'missing bearer token' });
  try {
    req.user = await verifyAccessToken(token);
  } catch {
    return res.status(401).json({ ok: false, error: 'invalid token' });
  }
  return next();
}

export function requirePermission(permCode: PermissionCode) {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = req.user;
    if (!user) return res.status(401).json({ ok: false, error: 'missing user' });
    if (!hasPermission(user.role, permCode)) return res.status(403).json({ ok: false, error: 'forbidden' });
    return next();
  };
}
