import { CookieOptions, NextFunction, Request, Response } from 'express';
import { resolve } from '../permissions';
import { SessionStore } from '../store/sessionStore';

export interface SessionCookieOptions {
  name: string;
  secure: boolean;
  ttlMs: number;
}

function cookieOptions(options: SessionCookieOptions): CookieOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure: options.secure,
    path: '/',
  };
}

export function readSessionId(req: Request, options: SessionCookieOptions): string | null {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const value = cookies[options.name];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function setSessionCookie(res: Response, sessionId: string, options: SessionCookieOptions): void {
  res.cookie(options.name, sessionId, { ...cookieOptions(options), maxAge: options.ttlMs });
}

export function clearSessionCookie(res: Response, options: SessionCookieOptions): void {
  res.clearCookie(options.name, cookieOptions(options));
}

/** Local absolute paths only, so a login cannot bounce the browser off-site. */
export function safeReturnUrl(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  if (!value.startsWith('/') || value.startsWith('//') || value.startsWith('/\\')) return null;
  if (/[\u0000-\u001f]/.test(value)) return null;
  return value;
}

/**
 * Session guard for browser routes.
 *
 * An authenticated session lets the request through with the principal and
 * its resolved capabilities attached. Anything else (no cookie, unknown or
 * expired id, a login still pending) starts a fresh pending session that
 * remembers where the browser wanted to go, and redirects to /login.
 */
export function createSessionMiddleware(sessionStore: SessionStore, options: SessionCookieOptions) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const sessionId = readSessionId(req, options);
      const session = sessionId ? await sessionStore.get(sessionId) : null;

      if (session?.state === 'authenticated') {
        req.authContext = {
          kind: 'session',
          sessionId: session.id,
          principal: session.principal,
          capabilities: resolve(session.principal.roles),
        };
        next();
        return;
      }

      if (session) {
        await sessionStore.delete(session.id);
      }
      const returnUrl = req.method === 'GET' ? safeReturnUrl(req.originalUrl) : null;
      const pending = await sessionStore.createPending(returnUrl);
      setSessionCookie(res, pending.id, options);
      res.redirect(302, '/login');
    } catch (error) {
      // Store failure, not a denial: let the error handler answer 5xx
      next(error);
    }
  };
}
