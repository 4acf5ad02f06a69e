import { NextFunction, Request, Response } from 'express';
import { AuthorizationFailure } from '../../shared/errors';
import { AuthContext, Capability } from '../../shared/types';
import { allows } from '../permissions';

/**
 * Runs after the identity guard. Reads the capabilities that guard attached:
 * resolved from the session's roles, or frozen in the token's claims.
 */
export function requireCapability(capability: Capability) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const authContext = req.authContext;

    if (!authContext) {
      next(new AuthorizationFailure('No auth context'));
      return;
    }

    if (!allows(authContext.capabilities, capability)) {
      next(new AuthorizationFailure(`${capability} required`));
      return;
    }

    next();
  };
}

/** For handlers behind a guard chain; throws if the chain was skipped. */
export function authContextOf(req: Request): AuthContext {
  if (!req.authContext) {
    throw new AuthorizationFailure('No auth context');
  }
  return req.authContext;
}

export function principalName(authContext: AuthContext): string {
  return authContext.kind === 'session' ? authContext.principal.login : authContext.subject;
}
