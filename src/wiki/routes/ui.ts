import { Request } from 'express';
import { z } from 'zod';
import { AuthorizationFailure } from '../../shared/errors';
import { AuthContext } from '../../shared/types';
import { authContextOf } from '../middleware/capability';
import { RouteDefinition } from '../pipeline';
import { EMPTY_PAGE_MARKDOWN, PageStore } from '../store/pageStore';
import { renderIndex, renderPage } from '../views';

const pageFormSchema = z.object({
  name: z.string().trim().min(1).max(255),
  markdown: z.string().default(EMPTY_PAGE_MARKDOWN),
});

const createFormSchema = z.object({
  name: z.string().trim().min(1).max(255),
  markdown: z.string().optional(),
});

const nameFormSchema = z.object({
  name: z.string().trim().min(1).max(255),
});

function pageLocation(name: string): string {
  return `/wiki/${encodeURIComponent(name)}`;
}

function sessionContext(req: Request): Extract<AuthContext, { kind: 'session' }> {
  const authContext = authContextOf(req);
  if (authContext.kind !== 'session') {
    throw new AuthorizationFailure('Browser routes need a session');
  }
  return authContext;
}

export function createUiRoutes(pageStore: PageStore): RouteDefinition[] {
  return [
    {
      method: 'get',
      path: '/',
      routeClass: 'ui',
      requires: 'canRead',
      handler: async (req, res) => {
        const { principal, capabilities } = sessionContext(req);
        const pages = await pageStore.listNames();
        res.type('html').send(renderIndex(pages, capabilities, principal.login));
      },
    },
    {
      method: 'get',
      path: '/wiki/:page',
      routeClass: 'ui',
      requires: 'canRead',
      handler: async (req, res) => {
        const { principal, capabilities } = sessionContext(req);
        const name = req.params.page;
        const page = await pageStore.findByName(name);
        res.type('html').send(renderPage(name, page, EMPTY_PAGE_MARKDOWN, capabilities, principal.login));
      },
    },
    {
      method: 'post',
      path: '/create',
      routeClass: 'ui',
      requires: 'canCreate',
      handler: async (req, res) => {
        const form = createFormSchema.safeParse(req.body);
        if (!form.success) {
          res.redirect(303, '/');
          return;
        }
        // A bare name opens the editor; the page is stored once content is submitted
        if (form.data.markdown !== undefined) {
          await pageStore.create(form.data.name, form.data.markdown);
        }
        res.redirect(303, pageLocation(form.data.name));
      },
    },
    {
      method: 'post',
      path: '/save',
      routeClass: 'ui',
      requires: 'canUpdate',
      handler: async (req, res) => {
        const form = pageFormSchema.safeParse(req.body);
        if (!form.success) {
          res.status(400).type('text/plain').send('Bad Request');
          return;
        }
        await pageStore.update(form.data.name, form.data.markdown);
        res.redirect(303, pageLocation(form.data.name));
      },
    },
    {
      method: 'post',
      path: '/delete',
      routeClass: 'ui',
      requires: 'canDelete',
      handler: async (req, res) => {
        const form = nameFormSchema.safeParse(req.body);
        if (!form.success) {
          res.status(400).type('text/plain').send('Bad Request');
          return;
        }
        await pageStore.delete(form.data.name);
        res.redirect(303, '/');
      },
    },
  ];
}
