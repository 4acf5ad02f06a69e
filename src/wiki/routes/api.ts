import { z } from 'zod';
import { AuthenticationFailure } from '../../shared/errors';
import { RouteDefinition } from '../pipeline';
import { PageStore } from '../store/pageStore';
import { TokenCodec } from '../token/tokenCodec';

const createPageSchema = z.object({
  name: z.string().trim().min(1).max(255),
  markdown: z.string(),
});

const updatePageSchema = z.object({
  markdown: z.string(),
});

function headerValue(value: string | string[] | undefined): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function createApiRoutes(pageStore: PageStore, tokenCodec: TokenCodec): RouteDefinition[] {
  return [
    {
      // Credentials travel in headers; the token comes back as plain text
      method: 'get',
      path: '/api/token',
      routeClass: 'public',
      handler: async (req, res) => {
        const login = headerValue(req.headers.login);
        const password = headerValue(req.headers.password);
        if (!login || !password) {
          throw new AuthenticationFailure('Missing credentials');
        }
        const token = await tokenCodec.issue(login, password);
        res.type('text/plain').send(token);
      },
    },
    {
      method: 'get',
      path: '/api/pages',
      routeClass: 'api',
      requires: 'canRead',
      handler: async (_req, res) => {
        const pages = await pageStore.list();
        res.json({ success: true, pages });
      },
    },
    {
      method: 'get',
      path: '/api/pages/:name',
      routeClass: 'api',
      requires: 'canRead',
      handler: async (req, res) => {
        const page = await pageStore.findByName(req.params.name);
        if (!page) {
          res.status(404).json({ success: false, error: `There is no page with name ${req.params.name}` });
          return;
        }
        res.json({ success: true, page: { id: page.id, name: page.name, markdown: page.content } });
      },
    },
    {
      method: 'post',
      path: '/api/pages',
      routeClass: 'api',
      requires: 'canCreate',
      handler: async (req, res) => {
        const body = createPageSchema.safeParse(req.body);
        if (!body.success) {
          res.status(400).json({ success: false, error: 'Bad request payload' });
          return;
        }
        await pageStore.create(body.data.name, body.data.markdown);
        res.status(201).json({ success: true });
      },
    },
    {
      method: 'put',
      path: '/api/pages/:name',
      routeClass: 'api',
      requires: 'canUpdate',
      handler: async (req, res) => {
        const body = updatePageSchema.safeParse(req.body);
        if (!body.success) {
          res.status(400).json({ success: false, error: 'Bad request payload' });
          return;
        }
        await pageStore.update(req.params.name, body.data.markdown);
        res.json({ success: true });
      },
    },
    {
      method: 'delete',
      path: '/api/pages/:name',
      routeClass: 'api',
      requires: 'canDelete',
      handler: async (req, res) => {
        await pageStore.delete(req.params.name);
        res.json({ success: true });
      },
    },
  ];
}
