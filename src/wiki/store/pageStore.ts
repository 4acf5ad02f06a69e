import { z } from 'zod';
import { OperationFailure } from '../../shared/errors';
import { Page } from '../../shared/types';
import { ConnectionPool } from '../db/connectionPool';
import { withConnection } from '../db/gateway';

const PAGES_KEY = 'wiki:pages';
const PAGE_SEQUENCE_KEY = 'wiki:pages:seq';

const storedPageSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  content: z.string(),
});

export const EMPTY_PAGE_MARKDOWN = '# A new page\n\nFeel-free to write in Markdown!\n';

function decodePage(raw: unknown): Page | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw !== 'string') {
    throw new OperationFailure('Unexpected page record type');
  }
  const parsed = storedPageSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new OperationFailure('Corrupt page record');
  }
  return parsed.data;
}

function asNumber(raw: unknown): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && /^-?\d+$/.test(raw)) return parseInt(raw, 10);
  throw new OperationFailure('Unexpected numeric reply');
}

/**
 * Pages live in one hash, keyed by name, each value a JSON record. Every
 * method is a single withConnection call.
 */
export class PageStore {
  constructor(private readonly pool: ConnectionPool) {}

  async listNames(): Promise<string[]> {
    return withConnection(this.pool, async (connection) => {
      const reply = await connection.execute('HKEYS', [PAGES_KEY]);
      if (!Array.isArray(reply)) {
        throw new OperationFailure('Unexpected page list reply');
      }
      return reply.map((name) => String(name)).sort();
    });
  }

  async list(): Promise<Array<Pick<Page, 'id' | 'name'>>> {
    return withConnection(this.pool, async (connection) => {
      const names = await connection.execute('HKEYS', [PAGES_KEY]);
      if (!Array.isArray(names)) {
        throw new OperationFailure('Unexpected page list reply');
      }
      const pages: Array<Pick<Page, 'id' | 'name'>> = [];
      for (const name of names.map((n) => String(n)).sort()) {
        const page = decodePage(await connection.execute('HGET', [PAGES_KEY, name]));
        if (page) pages.push({ id: page.id, name: page.name });
      }
      return pages;
    });
  }

  async findByName(name: string): Promise<Page | null> {
    return withConnection(this.pool, async (connection) =>
      decodePage(await connection.execute('HGET', [PAGES_KEY, name]))
    );
  }

  async create(name: string, content: string): Promise<Page> {
    return withConnection(this.pool, async (connection) => {
      if (asNumber(await connection.execute('HEXISTS', [PAGES_KEY, name])) === 1) {
        throw new OperationFailure(`Page ${name} already exists`, 409);
      }
      const id = asNumber(await connection.execute('INCR', [PAGE_SEQUENCE_KEY]));
      const page: Page = { id, name, content };
      const created = asNumber(await connection.execute('HSETNX', [PAGES_KEY, name, JSON.stringify(page)]));
      if (created !== 1) {
        throw new OperationFailure(`Page ${name} already exists`, 409);
      }
      return page;
    });
  }

  async update(name: string, content: string): Promise<Page> {
    return withConnection(this.pool, async (connection) => {
      const existing = decodePage(await connection.execute('HGET', [PAGES_KEY, name]));
      if (!existing) {
        throw new OperationFailure(`There is no page with name ${name}`, 404);
      }
      const page: Page = { ...existing, content };
      await connection.execute('HSET', [PAGES_KEY, name, JSON.stringify(page)]);
      return page;
    });
  }

  async delete(name: string): Promise<void> {
    return withConnection(this.pool, async (connection) => {
      const removed = asNumber(await connection.execute('HDEL', [PAGES_KEY, name]));
      if (removed !== 1) {
        throw new OperationFailure(`There is no page with name ${name}`, 404);
      }
    });
  }
}
