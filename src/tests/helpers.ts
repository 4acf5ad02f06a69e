import request from 'supertest';
import { Express } from 'express';
import { ConnectionPool, InMemoryConnectionPool } from '../wiki/db/connectionPool';
import { createApp } from '../wiki/index';
import { SessionCookieOptions } from '../wiki/middleware/session';
import { InMemoryCredentialStore, UserRecord } from '../wiki/store/credentialStore';
import { PageStore } from '../wiki/store/pageStore';
import { InMemorySessionStore, SessionStore } from '../wiki/store/sessionStore';
import { TokenCodec } from '../wiki/token/tokenCodec';

export const TEST_SECRET = 'test-secret';
export const TEST_ISSUER = 'wiki';
export const SESSION_TTL_MS = 60_000;

export const TEST_USERS: UserRecord[] = [
  { login: 'root', password: 'w00t', roles: ['admin'] },
  { login: 'foo', password: 'bar', roles: ['editor', 'writer'] },
  { login: 'bar', password: 'baz', roles: ['writer'] },
  { login: 'reader', password: 'reader-pass', roles: [] },
];

export const TEST_COOKIE: SessionCookieOptions = {
  name: 'wiki.sid',
  secure: false,
  ttlMs: SESSION_TTL_MS,
};

export interface TestContext {
  app: Express;
  pool: InMemoryConnectionPool;
  credentials: InMemoryCredentialStore;
  sessionStore: SessionStore;
  pageStore: PageStore;
  tokenCodec: TokenCodec;
}

export interface TestContextOptions {
  pool?: ConnectionPool;
  sessionStore?: SessionStore;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const pool = new InMemoryConnectionPool(undefined, { maxSize: 4, acquireTimeoutMs: 200 });
  const credentials = new InMemoryCredentialStore(TEST_USERS);
  const sessionStore = options.sessionStore ?? new InMemorySessionStore(SESSION_TTL_MS);
  const pageStore = new PageStore(options.pool ?? pool);
  const tokenCodec = new TokenCodec(credentials, { secret: TEST_SECRET, issuer: TEST_ISSUER });

  const app = createApp({ sessionStore, credentials, pageStore, tokenCodec, cookie: TEST_COOKIE });
  return { app, pool, credentials, sessionStore, pageStore, tokenCodec };
}

export type Agent = ReturnType<typeof request.agent>;

// Logs a browser agent in through the form; the agent keeps the session cookie
export async function loginAgent(app: Express, username: string, password: string): Promise<Agent> {
  const agent = request.agent(app);
  const res = await agent.post('/login').type('form').send({ username, password });
  if (res.status !== 303) {
    throw new Error(`Login for ${username} failed with ${res.status}`);
  }
  return agent;
}

export async function issueToken(app: Express, login: string, password: string): Promise<string> {
  const res = await request(app).get('/api/token').set('login', login).set('password', password);
  if (res.status !== 200) {
    throw new Error(`Token for ${login} failed with ${res.status}`);
  }
  return res.text;
}

/** Flips one bit of the decoded signature segment of a compact JWS. */
export function flipSignatureBit(token: string, bit: number): string {
  const [header, payload, signature] = token.split('.');
  const bytes = Buffer.from(signature, 'base64url');
  bytes[Math.floor(bit / 8)] ^= 1 << bit % 8;
  return `${header}.${payload}.${bytes.toString('base64url')}`;
}

export function sessionCookieFrom(res: request.Response): string | null {
  const header: unknown = res.headers['set-cookie'];
  const cookies = Array.isArray(header) ? header : [];
  for (const cookie of cookies) {
    if (typeof cookie === 'string' && cookie.startsWith(`${TEST_COOKIE.name}=`)) {
      return cookie.split(';')[0].slice(TEST_COOKIE.name.length + 1);
    }
  }
  return null;
}
