import { Capabilities, Capability, KNOWN_ROLES, Role } from '../shared/types';

const NONE: Capabilities = {
  canRead: true,
  canCreate: false,
  canUpdate: false,
  canDelete: false,
};

// What each known role adds on top of read access
const ROLE_GRANTS: Record<Role, Partial<Capabilities>> = {
  writer: { canUpdate: true },
  editor: { canCreate: true, canUpdate: true, canDelete: true },
  admin: { canCreate: true, canUpdate: true, canDelete: true },
};

export function isRole(name: string): name is Role {
  return KNOWN_ROLES.some((role) => role === name);
}

/**
 * Maps a role set to the four capabilities. Pure and order-independent;
 * unknown role names contribute nothing. Every gated route, view and token
 * issuance goes through here.
 */
export function resolve(roles: Iterable<string>): Capabilities {
  const capabilities: Capabilities = { ...NONE };

  for (const role of roles) {
    if (!isRole(role)) continue;
    const grants = ROLE_GRANTS[role];
    capabilities.canCreate ||= grants.canCreate === true;
    capabilities.canUpdate ||= grants.canUpdate === true;
    capabilities.canDelete ||= grants.canDelete === true;
  }

  return capabilities;
}

export function allows(capabilities: Capabilities, capability: Capability): boolean {
  return capabilities[capability];
}
