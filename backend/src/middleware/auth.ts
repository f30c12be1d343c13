import type { NextFunction, Request, Response } from 'express';
import type { AuthService, SessionUser, UserRole } from '../services/auth.js';

export function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header?.startsWith('Bearer ')) return undefined;
  return header.slice('Bearer '.length).trim() || undefined;
}

export function currentUser(req: Request, auth: AuthService): SessionUser | undefined {
  const token = bearerToken(req);
  return token ? auth.getSessionUser(token) : undefined;
}

// Rejects requests without a session (401) or with a session of another role (403)
export function requireRole(auth: AuthService, role: UserRole) {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = currentUser(req, auth);
    if (!user) {
      return res.status(401).json({ error: 'Login required' });
    }
    if (user.role !== role) {
      const label = role === 'teacher' ? 'Teacher' : 'Student';
      console.log(`[AUTH] ${user.id} denied ${req.method} ${req.originalUrl}`);
      return res.status(403).json({ error: `Access denied: ${label} login required` });
    }
    next();
  };
}
