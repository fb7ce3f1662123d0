/**
 * Authorization Types
 * Roles, permissions, role grants, overrides and the acting identity.
 */

/**
 * Actor Context - Who is performing the action
 * Authentication happens upstream; this only carries the identity.
 */
export interface ActorContext {
  type: 'user' | 'system';
  userId?: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for seeding and bootstrap jobs
 * Bypasses transition authority rules - use with caution
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
};

/**
 * Role entity (node of the inheritance DAG)
 */
export interface Role {
  id: string;
  name: string;
  level: number;
  parents: readonly string[];
}

/**
 * Permission entity (catalog entry)
 */
export interface Permission {
  codename: string;
  name: string;
  description: string;
  category: string;
  active: boolean;
  builtIn: boolean;
  createdAt: Date;
}

/**
 * Default grant of a permission to a role
 */
export interface RolePermission {
  roleId: string;
  codename: string;
  active: boolean;
  canDelegate: boolean;
}

export type OverridePolarity = 'grant' | 'deny';

/**
 * Per-user exception that outranks role-derived grants
 */
export interface Override {
  id: string;
  userId: string;
  codename: string;
  polarity: OverridePolarity;
  reason: string;
  expiresAt: Date | null;
  createdBy: string | null;
  createdAt: Date;
}

/**
 * Current role of a user
 */
export interface UserRoleAssignment {
  userId: string;
  roleId: string | null;
  assignedBy: string | null;
  assignedAt: Date;
}

/**
 * Parameters for defining a role
 */
export interface DefineRoleParams {
  id: string;
  name: string;
  level: number;
  parents?: string[];
}

/**
 * Parameters for registering a permission
 */
export interface RegisterPermissionParams {
  codename: string;
  name?: string;
  description: string;
  category: string;
  builtIn?: boolean;
}

/**
 * Parameters for toggling a role grant
 */
export interface SetRolePermissionParams {
  roleId: string;
  codename: string;
  active: boolean;
  canDelegate?: boolean;
}

/**
 * Parameters for creating an override
 */
export interface CreateOverrideParams {
  userId: string;
  codename: string;
  reason: string;
  expiresAt?: Date | null;
}

/**
 * Parameters for removing an override
 */
export interface RemoveOverrideParams {
  userId: string;
  codename: string;
  polarity: OverridePolarity;
}

/**
 * Parameters for a role transition
 */
export interface TransitionRoleParams {
  targetUserId: string;
  toRole: string;
  reason?: string;
}

/**
 * Parameters for removing a user's role
 */
export interface RemoveRoleParams {
  targetUserId: string;
  reason?: string;
}

/**
 * Options accepted by per-user mutations
 */
export interface MutationOptions {
  timeoutMs?: number;
}
