import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { AuthenticationFailure, ResourceAcquisitionFailure } from '../shared/errors';
import {
  authenticate,
  createPrincipal,
  CredentialStore,
  InMemoryCredentialStore,
  loadCredentialStore,
} from '../wiki/store/credentialStore';
import { TEST_USERS } from './helpers';

describe('InMemoryCredentialStore', () => {
  const store = new InMemoryCredentialStore(TEST_USERS);

  test('returns the principal for a matching password', async () => {
    await expect(store.authenticate('bar', 'baz')).resolves.toEqual({ login: 'bar', roles: ['writer'] });
  });

  test('returns roles sorted', async () => {
    const principal = await store.authenticate('foo', 'bar');
    expect(principal.roles).toEqual(['editor', 'writer']);
  });

  test('rejects a wrong password', async () => {
    await expect(store.authenticate('bar', 'nope')).rejects.toBeInstanceOf(AuthenticationFailure);
  });

  test('rejects an unknown login', async () => {
    await expect(store.authenticate('nobody', 'baz')).rejects.toBeInstanceOf(AuthenticationFailure);
  });

  test('rejects an empty password for a known login', async () => {
    await expect(store.authenticate('root', '')).rejects.toBeInstanceOf(AuthenticationFailure);
  });
});

describe('authenticate', () => {
  const failing = (error: Error): CredentialStore => ({
    authenticate: () => Promise.reject(error),
  });

  test('passes a denial through unchanged', async () => {
    const denial = new AuthenticationFailure();
    await expect(authenticate(failing(denial), 'bar', 'baz')).rejects.toBe(denial);
  });

  test('reports a backend failure as unavailable, keeping the cause', async () => {
    const outage = new Error('LDAP down');
    const result = authenticate(failing(outage), 'bar', 'baz');

    await expect(result).rejects.toBeInstanceOf(ResourceAcquisitionFailure);
    await expect(result).rejects.toMatchObject({ message: 'Credential store unavailable', cause: outage });
  });

  test('returns the principal on success', async () => {
    await expect(authenticate(new InMemoryCredentialStore(TEST_USERS), 'root', 'w00t')).resolves.toEqual({
      login: 'root',
      roles: ['admin'],
    });
  });
});

describe('createPrincipal', () => {
  test('deduplicates roles and freezes the result', () => {
    const principal = createPrincipal('foo', ['writer', 'editor', 'writer']);
    expect(principal.roles).toEqual(['editor', 'writer']);
    expect(Object.isFrozen(principal)).toBe(true);
    expect(Object.isFrozen(principal.roles)).toBe(true);
  });
});

describe('loadCredentialStore', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wiki-users-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('reads the bundled users file', async () => {
    const store = await loadCredentialStore(path.join(__dirname, '..', '..', 'config', 'wiki-users.json'));
    await expect(store.authenticate('root', 'w00t')).resolves.toEqual({ login: 'root', roles: ['admin'] });
    await expect(store.authenticate('bar', 'baz')).resolves.toEqual({ login: 'bar', roles: ['writer'] });
  });

  test('defaults missing roles to none', async () => {
    const file = path.join(dir, 'no-roles.json');
    await fs.writeFile(file, JSON.stringify({ users: [{ login: 'anne', password: 'test-password' }] }));
    const store = await loadCredentialStore(file);
    await expect(store.authenticate('anne', 'test-password')).resolves.toEqual({ login: 'anne', roles: [] });
  });

  test('fails as unavailable when the file is missing', async () => {
    await expect(loadCredentialStore(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(
      ResourceAcquisitionFailure
    );
  });

  test('fails as unavailable when the file is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ users: ');
    await expect(loadCredentialStore(file)).rejects.toBeInstanceOf(ResourceAcquisitionFailure);
  });

  test('fails as unavailable when entries are malformed', async () => {
    const file = path.join(dir, 'malformed.json');
    await fs.writeFile(file, JSON.stringify({ users: [{ login: 'anne' }] }));
    await expect(loadCredentialStore(file)).rejects.toBeInstanceOf(ResourceAcquisitionFailure);
  });
});
