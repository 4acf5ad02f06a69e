import { ErrorRequestHandler, Request, Response } from 'express';
import {
  AuthenticationFailure,
  AuthorizationFailure,
  OperationFailure,
  ResourceAcquisitionFailure,
  TokenInvalid,
  toError,
} from '../../shared/errors';
import { createLogger } from '../../shared/logger';
import { principalName } from './capability';

const log = createLogger('http');

function isApiRequest(req: Request): boolean {
  return req.originalUrl === '/api' || req.originalUrl.startsWith('/api/');
}

// body-parser attaches a 4xx status to malformed bodies
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function reply(req: Request, res: Response, status: number, message: string): void {
  if (isApiRequest(req)) {
    res.status(status).json({ success: false, error: message });
  } else {
    res.status(status).type('text/plain').send(message);
  }
}

/**
 * Maps the failure taxonomy to responses. 401s carry nothing beyond the
 * status text, so a missing token and a bad one look the same.
 */
export function createErrorHandler(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof TokenInvalid || err instanceof AuthenticationFailure) {
      log.debug('Rejected credentials', { path: req.path, reason: err instanceof TokenInvalid ? err.reason : 'login' });
      res.sendStatus(401);
      return;
    }

    if (err instanceof AuthorizationFailure) {
      log.debug('Capability denied', {
        path: req.path,
        principal: req.authContext ? principalName(req.authContext) : null,
        reason: err.message,
      });
      reply(req, res, 403, 'Forbidden');
      return;
    }

    if (err instanceof OperationFailure) {
      if (err.status >= 500) {
        log.warn('Database operation failed', { method: req.method, path: req.path }, err);
        reply(req, res, err.status, 'Internal Server Error');
      } else {
        reply(req, res, err.status, err.message);
      }
      return;
    }

    if (err instanceof ResourceAcquisitionFailure) {
      log.error('Backend unavailable', err, { method: req.method, path: req.path });
      reply(req, res, 503, 'Service Unavailable');
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      reply(req, res, clientStatus, 'Bad Request');
      return;
    }

    log.error('Unhandled error', toError(err), { method: req.method, path: req.path });
    reply(req, res, 500, 'Internal Server Error');
  };
}
