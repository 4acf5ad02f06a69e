import { NextFunction, Request, Response } from 'express';
import { TokenInvalid } from '../../shared/errors';
import { TokenCodec } from '../token/tokenCodec';

const BEARER = /^Bearer\s+(\S+)$/i;

/**
 * Token guard for API routes. A missing header, a non-Bearer scheme and a
 * token that fails verification all end in the same bare 401.
 */
export function createAuthMiddleware(tokenCodec: TokenCodec) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      next(new TokenInvalid('missing'));
      return;
    }

    const match = BEARER.exec(authHeader);
    if (!match) {
      next(new TokenInvalid('scheme'));
      return;
    }

    try {
      const verified = await tokenCodec.verify(match[1]);
      req.authContext = {
        kind: 'token',
        subject: verified.subject,
        capabilities: verified.capabilities,
      };
      next();
    } catch (error) {
      next(error);
    }
  };
}
