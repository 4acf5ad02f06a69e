import { z } from 'zod';
import { AuthenticationFailure } from '../../shared/errors';
import { createLogger } from '../../shared/logger';
import { Principal } from '../../shared/types';
import {
  clearSessionCookie,
  readSessionId,
  safeReturnUrl,
  SessionCookieOptions,
  setSessionCookie,
} from '../middleware/session';
import { RouteDefinition } from '../pipeline';
import { authenticate, CredentialStore } from '../store/credentialStore';
import { SessionStore } from '../store/sessionStore';
import { renderLogin } from '../views';

const log = createLogger('auth');

const loginFormSchema = z.object({
  username: z.string().default(''),
  password: z.string().default(''),
  return_url: z.string().optional(),
});

/** Login form and the pending → authenticated → logged-out transitions. */
export function createAuthRoutes(
  sessionStore: SessionStore,
  credentials: CredentialStore,
  cookie: SessionCookieOptions
): RouteDefinition[] {
  return [
    {
      method: 'get',
      path: '/login',
      routeClass: 'public',
      handler: async (req, res) => {
        const returnUrl = safeReturnUrl(req.query.return_url);
        res.type('html').send(renderLogin({ error: false, returnUrl }));
      },
    },
    {
      method: 'post',
      path: '/login',
      routeClass: 'public',
      handler: async (req, res) => {
        const form = loginFormSchema.safeParse(req.body ?? {});
        const fields = form.success ? form.data : { username: '', password: '', return_url: undefined };
        const requestedReturn = safeReturnUrl(fields.return_url);

        let principal: Principal;
        try {
          principal = await authenticate(credentials, fields.username, fields.password);
        } catch (error) {
          if (!(error instanceof AuthenticationFailure)) throw error;
          log.info('Failed login', { login: fields.username });
          res.status(401).type('html').send(renderLogin({ error: true, returnUrl: requestedReturn }));
          return;
        }

        // A fresh id on login; the pending record only contributes its return URL
        let pendingReturn: string | null = null;
        const previousId = readSessionId(req, cookie);
        if (previousId) {
          const previous = await sessionStore.get(previousId);
          if (previous?.state === 'pending') {
            pendingReturn = previous.returnUrl;
          }
          await sessionStore.delete(previousId);
        }

        const session = await sessionStore.createAuthenticated(principal);
        setSessionCookie(res, session.id, cookie);
        log.info('Login', { login: principal.login });
        res.redirect(303, requestedReturn ?? pendingReturn ?? '/');
      },
    },
    {
      method: 'get',
      path: '/logout',
      routeClass: 'public',
      handler: async (req, res) => {
        const sessionId = readSessionId(req, cookie);
        if (sessionId) {
          await sessionStore.delete(sessionId);
        }
        clearSessionCookie(res, cookie);
        res.redirect(303, '/');
      },
    },
  ];
}
