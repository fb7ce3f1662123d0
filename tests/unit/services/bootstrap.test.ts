/**
 * Bootstrap Unit Tests
 * Snapshot loading and idempotent seeding
 */

import { describe, it, expect } from 'vitest';

import { applySeed, loadPolicySnapshot, parseSeed } from '@/services/bootstrap.js';
import type { RbacSeed } from '@/services/bootstrap.js';
import { SYSTEM_ACTOR } from '@/types/index.js';

import { createHarness, loadTestSeed } from '../../helpers/harness.js';
import { createInMemoryDbs } from '../../helpers/in-memory-db.js';

describe('parseSeed', () => {
  it('should accept the shipped seed', () => {
    const seed = loadTestSeed();

    expect(seed.roles).toHaveLength(9);
    expect(seed.permissions).toHaveLength(37);
    expect(seed.grants['chief_of_staff']).toContainEqual({
      codename: 'assign_roles',
      canDelegate: true,
    });
  });

  it('should default parents and grants', () => {
    const result = parseSeed({
      roles: [{ id: 'member', name: 'Member', level: 1 }],
      permissions: [],
    });

    expect(result).toEqual({
      success: true,
      data: {
        roles: [{ id: 'member', name: 'Member', level: 1, parents: [] }],
        permissions: [],
        grants: {},
      },
    });
  });

  it('should list every problem', () => {
    const result = parseSeed({ roles: [{ id: '', name: 'Nameless', level: 1.5 }] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.details).toEqual({
        issues: [
          'roles.0.id: String must contain at least 1 character(s)',
          'roles.0.level: Expected integer, received float',
          'permissions: Required',
        ],
      });
    }
  });
});

describe('applySeed', () => {
  it('should build the whole policy on an empty store', async () => {
    const h = await createHarness({ seeded: false });

    const result = await applySeed(
      { roleGraph: h.roleGraph, catalog: h.catalog },
      loadTestSeed()
    );

    expect(result).toEqual({
      success: true,
      data: { rolesCreated: 9, edgesAdded: 0, permissionsCreated: 37, grantsSet: 44 },
    });
    expect(h.store.roles.size).toBe(9);
    expect(h.store.permissions.get('manage_permissions')).toMatchObject({
      name: 'Manage Permissions',
      builtIn: true,
    });
    expect(h.store.audit).toHaveLength(90);
    expect(h.store.audit.every((entry) => entry.actorType === 'system')).toBe(true);

    h.assign('u-chief', 'chief_of_staff');
    expect(await h.resolver.resolve('u-chief', 'manage_tasks')).toBe(true);
  });

  it('should change nothing when applied twice', async () => {
    const h = await createHarness({ seeded: false });
    const seed = loadTestSeed();
    await applySeed({ roleGraph: h.roleGraph, catalog: h.catalog }, seed);

    const again = await applySeed({ roleGraph: h.roleGraph, catalog: h.catalog }, seed);

    expect(again).toEqual({
      success: true,
      data: { rolesCreated: 0, edgesAdded: 0, permissionsCreated: 0, grantsSet: 0 },
    });
    expect(h.store.audit).toHaveLength(90);
  });

  it('should restore a missing edge of an existing role', async () => {
    const h = await createHarness();
    await h.roleGraph.removeEdge(SYSTEM_ACTOR, 'chief_of_staff', 'admin');

    const result = await applySeed(
      { roleGraph: h.roleGraph, catalog: h.catalog },
      loadTestSeed()
    );

    expect(result.success && result.data.edgesAdded).toBe(1);
    expect(h.roleGraph.getRole('chief_of_staff')?.parents).toEqual([
      'info_officer',
      'coordinator',
      'admin',
    ]);
  });

  it('should define parents before children whatever the file order', async () => {
    const h = await createHarness({ seeded: false });
    const seed: RbacSeed = {
      roles: [
        { id: 'lead', name: 'Lead', level: 2, parents: ['member'] },
        { id: 'member', name: 'Member', level: 1, parents: [] },
      ],
      permissions: [],
      grants: {},
    };

    const result = await applySeed({ roleGraph: h.roleGraph, catalog: h.catalog }, seed);

    expect(result.success && result.data.rolesCreated).toBe(2);
    expect(h.store.audit.map((entry) => entry.target.id)).toEqual(['member', 'lead']);
  });

  it('should refuse roles that inherit in a cycle', async () => {
    const h = await createHarness({ seeded: false });
    const seed: RbacSeed = {
      roles: [
        { id: 'a', name: 'A', level: 1, parents: ['b'] },
        { id: 'b', name: 'B', level: 2, parents: ['a'] },
      ],
      permissions: [],
      grants: {},
    };

    const result = await applySeed({ roleGraph: h.roleGraph, catalog: h.catalog }, seed);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('CYCLE_DETECTED');
    }
    expect(h.store.roles.size).toBe(0);
  });

  it('should stop at a grant for an unknown role', async () => {
    const h = await createHarness();
    const seed: RbacSeed = {
      roles: [],
      permissions: [],
      grants: { emperor: ['manage_tasks'] },
    };

    const result = await applySeed({ roleGraph: h.roleGraph, catalog: h.catalog }, seed);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('UNKNOWN_ROLE');
    }
  });
});

describe('loadPolicySnapshot', () => {
  it('should refuse a stored graph with a duplicate level', async () => {
    const { dbs, store } = createInMemoryDbs();
    store.roles.set('a', { id: 'a', name: 'A', level: 1, parents: [] });
    store.roles.set('b', { id: 'b', name: 'B', level: 1, parents: [] });

    await expect(
      loadPolicySnapshot({ roleGraphDb: dbs.roleGraph, catalogDb: dbs.catalog })
    ).rejects.toThrow('Stored role graph is invalid: level 1 claimed by both a and b');
  });
});
