import cookieParser from 'cookie-parser';
import express from 'express';
import { config } from '../shared/config';
import { toError } from '../shared/errors';
import { createLogger } from '../shared/logger';
import { createConnectionPool } from './db/connectionPool';
import { withConnection } from './db/gateway';
import { createAuthMiddleware } from './middleware/auth';
import { createErrorHandler } from './middleware/errors';
import { createSessionMiddleware, SessionCookieOptions } from './middleware/session';
import { GuardChains, mountRoutes } from './pipeline';
import { createApiRoutes } from './routes/api';
import { createAuthRoutes } from './routes/auth';
import { createUiRoutes } from './routes/ui';
import { CredentialStore, loadCredentialStore } from './store/credentialStore';
import { PageStore } from './store/pageStore';
import { createSessionStore, SessionStore } from './store/sessionStore';
import { TokenCodec } from './token/tokenCodec';

const log = createLogger('wiki');

export interface AppDependencies {
  sessionStore: SessionStore;
  credentials: CredentialStore;
  pageStore: PageStore;
  tokenCodec: TokenCodec;
  cookie?: SessionCookieOptions;
}

export function defaultCookieOptions(): SessionCookieOptions {
  return {
    name: config.wiki.sessionCookie,
    secure: config.wiki.cookieSecure,
    ttlMs: config.wiki.sessionTtlMs,
  };
}

export function createApp(deps: AppDependencies): express.Express {
  const cookie = deps.cookie ?? defaultCookieOptions();

  const app = express();
  app.disable('x-powered-by');
  app.use(cookieParser());

  // Public routes
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'wiki' });
  });

  // Identity guard per route class; capability guards are appended per route
  const chains: GuardChains = {
    ui: [createSessionMiddleware(deps.sessionStore, cookie)],
    api: [createAuthMiddleware(deps.tokenCodec)],
  };

  const router = express.Router();
  mountRoutes(
    router,
    [
      ...createAuthRoutes(deps.sessionStore, deps.credentials, cookie),
      ...createApiRoutes(deps.pageStore, deps.tokenCodec),
      ...createUiRoutes(deps.pageStore),
    ],
    chains
  );

  // Unknown API paths still need a valid token before they get a 404
  router.use('/api', ...chains.api, (_req, res) => {
    res.status(404).json({ success: false, error: 'Not Found' });
  });

  app.use(router);
  app.use(createErrorHandler());
  return app;
}

// Initialize and start
async function start(): Promise<void> {
  const credentials = await loadCredentialStore(config.wiki.usersFile);

  const sessionStore = createSessionStore();
  await sessionStore.connect();

  const pool = createConnectionPool();
  await withConnection(pool, (connection) => connection.execute('PING'));

  const tokenCodec = new TokenCodec(credentials, {
    secret: config.wiki.jwtSecret,
    issuer: config.wiki.jwtIssuer,
    ttlSeconds: config.wiki.tokenTtlSeconds,
  });

  const app = createApp({
    sessionStore,
    credentials,
    pageStore: new PageStore(pool),
    tokenCodec,
  });

  const port = config.wiki.port;
  const server = app.listen(port, () => {
    log.info('Wiki listening', { port });
  });

  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal });
    server.close(() => {
      Promise.all([pool.close(), sessionStore.disconnect()])
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error('Shutdown failed', toError(error));
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  start().catch((error: unknown) => {
    log.error('Startup failed', toError(error));
    process.exit(1);
  });
}
