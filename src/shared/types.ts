export type Role = 'writer' | 'editor' | 'admin';

export const KNOWN_ROLES: readonly Role[] = ['writer', 'editor', 'admin'];

export interface Capabilities {
  canRead: boolean;
  canCreate: boolean;
  canUpdate: boolean;
  canDelete: boolean;
}

export type Capability = keyof Capabilities;

// Roles are kept as plain strings: the credential backend may hand back names
// this service does not know, and those simply grant nothing.
export interface Principal {
  readonly login: string;
  readonly roles: readonly string[];
}

interface SessionBase {
  id: string;
  createdAt: number;
  expiresAt: number; // Unix timestamp (ms)
}

export interface PendingSession extends SessionBase {
  state: 'pending';
  returnUrl: string | null;
}

export interface AuthenticatedSession extends SessionBase {
  state: 'authenticated';
  principal: Principal;
}

export type Session = PendingSession | AuthenticatedSession;

export interface TokenClaims {
  sub: string;
  caps: Capabilities;
  iss: string;
  iat: number;
  exp?: number;
}

export interface TokenPrincipal {
  subject: string;
  capabilities: Capabilities;
  issuedAt: number;
}

export type AuthContext =
  | {
      kind: 'session';
      sessionId: string;
      principal: Principal;
      capabilities: Capabilities;
    }
  | {
      kind: 'token';
      subject: string;
      capabilities: Capabilities;
    };

export interface Page {
  id: number;
  name: string;
  content: string;
}

// Which guard chain a route sits behind
export type RouteClass = 'ui' | 'api';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}
