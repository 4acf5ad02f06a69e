import { createHash, timingSafeEqual } from 'crypto';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { AuthenticationFailure, ResourceAcquisitionFailure } from '../../shared/errors';
import { Principal } from '../../shared/types';

/**
 * The only view the core has of the credential backend (file, LDAP,
 * directory service). Callers await it as one opaque step.
 */
export interface CredentialStore {
  authenticate(login: string, password: string): Promise<Principal>;
}

/**
 * Rejects with AuthenticationFailure for a denial and ResourceAcquisitionFailure
 * when the backend itself could not answer.
 */
export async function authenticate(store: CredentialStore, login: string, password: string): Promise<Principal> {
  try {
    return await store.authenticate(login, password);
  } catch (error) {
    if (error instanceof AuthenticationFailure || error instanceof ResourceAcquisitionFailure) throw error;
    throw new ResourceAcquisitionFailure('Credential store unavailable', { cause: error });
  }
}

export interface UserRecord {
  login: string;
  password: string;
  roles: string[];
}

const usersFileSchema = z.object({
  users: z.array(
    z.object({
      login: z.string().min(1),
      password: z.string().min(1),
      roles: z.array(z.string()).default([]),
    })
  ),
});

export function createPrincipal(login: string, roles: Iterable<string>): Principal {
  return Object.freeze({
    login,
    roles: Object.freeze([...new Set(roles)].sort()),
  });
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export class InMemoryCredentialStore implements CredentialStore {
  private users: Map<string, UserRecord> = new Map();

  constructor(users: UserRecord[] = []) {
    for (const user of users) {
      this.users.set(user.login, user);
    }
  }

  async authenticate(login: string, password: string): Promise<Principal> {
    const user = this.users.get(login);

    // Compare fixed-length digests so timing does not depend on the password length
    const expected = digest(user ? user.password : '');
    const matches = timingSafeEqual(expected, digest(password));

    if (!user || !matches) {
      throw new AuthenticationFailure();
    }
    return createPrincipal(user.login, user.roles);
  }
}

/**
 * Development backend: users, plaintext passwords and roles from a JSON file
 * of the shape `{ "users": [{ "login", "password", "roles": [] }] }`.
 */
export async function loadCredentialStore(file: string): Promise<InMemoryCredentialStore> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new ResourceAcquisitionFailure(`Cannot read users file ${file}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ResourceAcquisitionFailure(`Users file ${file} is not valid JSON`, { cause: error });
  }

  const parsed = usersFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ResourceAcquisitionFailure(
      `Users file ${file} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown error'}`
    );
  }

  return new InMemoryCredentialStore(parsed.data.users);
}
