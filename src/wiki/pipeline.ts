import express, { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { Capability, RouteClass } from '../shared/types';
import { requireCapability } from './middleware/capability';

export type RouteHandler = (req: Request, res: Response) => Promise<void>;

interface RouteBase {
  method: 'get' | 'post' | 'put' | 'delete';
  path: string;
  handler: RouteHandler;
}

/**
 * A route's guards are static data: its class picks the identity chain and
 * `requires` names the capability checked after identity is established.
 */
export type RouteDefinition =
  | (RouteBase & { routeClass: 'public' })
  | (RouteBase & { routeClass: RouteClass; requires: Capability });

export type GuardChains = Record<RouteClass, readonly RequestHandler[]>;

// Bodies are parsed only once the guards have admitted the request
const bodyParsers: readonly RequestHandler[] = [express.urlencoded({ extended: false }), express.json()];

function asyncHandler(handler: RouteHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function guardsFor(route: RouteDefinition, chains: GuardChains): RequestHandler[] {
  if (route.routeClass === 'public') {
    return [];
  }
  return [...chains[route.routeClass], requireCapability(route.requires)];
}

/** Each guard either calls next() or ends the request; the handler runs only if all pass. */
export function mountRoutes(router: Router, routes: readonly RouteDefinition[], chains: GuardChains): Router {
  for (const route of routes) {
    const handlers = [...guardsFor(route, chains), ...bodyParsers, asyncHandler(route.handler)];
    switch (route.method) {
      case 'get':
        router.get(route.path, ...handlers);
        break;
      case 'post':
        router.post(route.path, ...handlers);
        break;
      case 'put':
        router.put(route.path, ...handlers);
        break;
      case 'delete':
        router.delete(route.path, ...handlers);
        break;
    }
  }
  return router;
}
