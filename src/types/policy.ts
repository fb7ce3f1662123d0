/**
 * Policy Snapshot Types
 *
 * Role graph and catalog live in one immutable, versioned snapshot.
 * Structural mutations build a new snapshot and swap the reference;
 * readers hold whatever reference they took and never see a partial update.
 */

import type { Permission, Role, RolePermission } from './auth.js';

export interface PolicySnapshot {
  readonly version: number;
  readonly roles: ReadonlyMap<string, Role>;
  readonly permissions: ReadonlyMap<string, Permission>;
  /** roleId -> codename -> grant */
  readonly rolePermissions: ReadonlyMap<
    string,
    ReadonlyMap<string, RolePermission>
  >;
}

/**
 * Version stamp of a cache entry
 * generation identifies the writing process (entries left in the backend by
 * an earlier process never match), epoch moves on global invalidation,
 * userVersion on per-user invalidation
 */
export interface CacheStamp {
  generation: string;
  epoch: number;
  userVersion: number;
}

/**
 * Resolved permission set as stored in the cache backend
 */
export interface CachedPermissions {
  codenames: string[];
  stamp: CacheStamp;
  /** epoch ms after which an applied override has expired; null = none */
  validUntil: number | null;
}

/**
 * Role change announced to the notification collaborator
 */
export interface RoleChangeNotice {
  userId: string;
  oldRole: string | null;
  newRole: string | null;
  actorId: string | null;
}

export interface NotificationSink {
  notify(notice: RoleChangeNotice): Promise<void>;
}
