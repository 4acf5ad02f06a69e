import { OperationFailure } from '../shared/errors';
import { InMemoryConnectionPool } from '../wiki/db/connectionPool';
import { PageStore } from '../wiki/store/pageStore';

describe('PageStore', () => {
  let pool: InMemoryConnectionPool;
  let store: PageStore;

  beforeEach(() => {
    pool = new InMemoryConnectionPool(undefined, { maxSize: 2, acquireTimeoutMs: 50 });
    store = new PageStore(pool);
  });

  afterEach(() => {
    // Every operation must have handed its connection back
    expect(pool.stats().leased).toBe(0);
    expect(pool.stats().acquired).toBe(pool.stats().released);
  });

  test('creates pages with increasing ids', async () => {
    await expect(store.create('Home', '# Home')).resolves.toEqual({ id: 1, name: 'Home', content: '# Home' });
    await expect(store.create('About', 'about')).resolves.toEqual({ id: 2, name: 'About', content: 'about' });
    await expect(store.findByName('Home')).resolves.toEqual({ id: 1, name: 'Home', content: '# Home' });
  });

  test('returns null for a missing page', async () => {
    await expect(store.findByName('Nope')).resolves.toBeNull();
  });

  test('lists names and summaries sorted by name', async () => {
    await store.create('b', 'second');
    await store.create('a', 'first');

    await expect(store.listNames()).resolves.toEqual(['a', 'b']);
    await expect(store.list()).resolves.toEqual([
      { id: 2, name: 'a' },
      { id: 1, name: 'b' },
    ]);
  });

  test('refuses to create a page twice', async () => {
    await store.create('Home', 'one');
    await expect(store.create('Home', 'two')).rejects.toMatchObject({
      status: 409,
      message: 'Page Home already exists',
    });
    await expect(store.findByName('Home')).resolves.toMatchObject({ content: 'one' });
  });

  test('updates content and keeps the id', async () => {
    await store.create('Home', 'one');
    await expect(store.update('Home', 'two')).resolves.toEqual({ id: 1, name: 'Home', content: 'two' });
    await expect(store.findByName('Home')).resolves.toEqual({ id: 1, name: 'Home', content: 'two' });
  });

  test('update of a missing page is a 404 failure', async () => {
    await expect(store.update('Ghost', 'x')).rejects.toMatchObject({
      status: 404,
      message: 'There is no page with name Ghost',
    });
  });

  test('deletes pages', async () => {
    await store.create('Home', 'one');
    await store.delete('Home');
    await expect(store.findByName('Home')).resolves.toBeNull();
    await expect(store.delete('Home')).rejects.toMatchObject({ status: 404 });
  });

  test('a corrupt record is an operation failure', async () => {
    pool.keyspace.hash('wiki:pages').set('Broken', 'not json');
    const error = await store.findByName('Broken').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(OperationFailure);
    expect(error).toMatchObject({ status: 500 });
  });
});
