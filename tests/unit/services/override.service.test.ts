/**
 * OverrideService Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { isOverrideActive } from '@/services/override.service.js';

import { createHarness, TEST_NOW, userActor } from '../../helpers/harness.js';
import type { Harness } from '../../helpers/harness.js';

const HOUR = 60 * 60 * 1000;

describe('OverrideService', () => {
  let h: Harness;
  const admin = userActor('u-admin');

  beforeEach(async () => {
    h = await createHarness();
    h.assign('u-staff', 'staff');
  });

  // ─────────────────────────────────────────────────────────────────────────
  // grant / deny
  // ─────────────────────────────────────────────────────────────────────────

  describe('grant', () => {
    it('should record the override with its author', async () => {
      const result = await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'Quarterly review',
        expiresAt: new Date(TEST_NOW.getTime() + HOUR),
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toMatchObject({
          userId: 'u-staff',
          codename: 'view_audit_logs',
          polarity: 'grant',
          reason: 'Quarterly review',
          expiresAt: new Date(TEST_NOW.getTime() + HOUR),
          createdBy: 'u-admin',
          createdAt: TEST_NOW,
        });
        expect(h.store.audit[0]).toMatchObject({
          action: 'override:create',
          target: { type: 'override', id: result.data.id },
          before: null,
          after: {
            codename: 'view_audit_logs',
            polarity: 'grant',
            expiresAt: '2026-03-01T13:00:00.000Z',
          },
          reason: 'Quarterly review',
        });
      }
    });

    it('should replace an existing override of the same polarity', async () => {
      const first = await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'First',
      });
      const second = await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'Second',
      });

      expect(first.success && second.success).toBe(true);
      if (first.success && second.success) {
        expect(second.data.id).toBe(first.data.id);
      }
      expect(h.store.overrides.size).toBe(1);
      expect(h.store.audit[1]).toMatchObject({
        before: { reason: 'First' },
        after: { reason: 'Second' },
      });
    });

    it('should keep a grant and a deny on the same codename apart', async () => {
      await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'Grant',
      });
      await h.overrides.deny(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'Deny',
      });

      expect(h.store.overrides.size).toBe(2);
    });

    it('should reject an unregistered codename', async () => {
      const result = await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'launch_rockets',
        reason: 'test',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          code: 'UNKNOWN_PERMISSION',
          message: 'Permission launch_rockets is not registered',
        });
      }
    });

    it('should require a reason', async () => {
      const result = await h.overrides.deny(admin, {
        userId: 'u-staff',
        codename: 'manage_tasks',
        reason: '   ',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('A reason is required for overrides');
      }
    });

    it('should reject an expiry in the past', async () => {
      const result = await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'test',
        expiresAt: TEST_NOW,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          code: 'VALIDATION_ERROR',
          message: 'Expiry must be in the future',
        });
      }
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // remove / expire
  // ─────────────────────────────────────────────────────────────────────────

  describe('remove', () => {
    it('should delete the override and restore the role decision', async () => {
      await h.overrides.deny(admin, {
        userId: 'u-staff',
        codename: 'manage_tasks',
        reason: 'Suspended',
      });
      expect(await h.resolver.resolve('u-staff', 'manage_tasks')).toBe(false);

      const result = await h.overrides.remove(admin, {
        userId: 'u-staff',
        codename: 'manage_tasks',
        polarity: 'deny',
      });

      expect(result).toEqual({ success: true, data: undefined });
      expect(h.store.overrides.size).toBe(0);
      expect(h.store.audit[1]).toMatchObject({ action: 'override:remove', after: null });
      expect(await h.resolver.resolve('u-staff', 'manage_tasks')).toBe(true);
    });

    it('should return NOT_FOUND when nothing matches', async () => {
      const result = await h.overrides.remove(admin, {
        userId: 'u-staff',
        codename: 'manage_tasks',
        polarity: 'grant',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          'No grant override on manage_tasks for u-staff'
        );
      }
    });
  });

  describe('expire', () => {
    it('should end the override now and keep it on record', async () => {
      const created = await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'Temporary',
      });
      if (!created.success) {
        throw new Error('setup failed');
      }
      expect(await h.resolver.resolve('u-staff', 'view_audit_logs')).toBe(true);

      const result = await h.overrides.expire(admin, created.data.id);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.expiresAt).toEqual(TEST_NOW);
      }
      expect(await h.resolver.resolve('u-staff', 'view_audit_logs')).toBe(false);
      expect(h.store.overrides.size).toBe(1);

      const again = await h.overrides.expire(admin, created.data.id);
      expect(again.success).toBe(false);
      if (!again.success) {
        expect(again.error.code).toBe('VALIDATION_ERROR');
      }
    });

    it('should return NOT_FOUND for an unknown id', async () => {
      const result = await h.overrides.expire(admin, 'ovr_missing');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
      }
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // listForUser
  // ─────────────────────────────────────────────────────────────────────────

  describe('listForUser', () => {
    it('should hide expired overrides unless asked', async () => {
      await h.overrides.grant(admin, {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'Short',
        expiresAt: new Date(TEST_NOW.getTime() + HOUR),
      });
      await h.overrides.deny(admin, {
        userId: 'u-staff',
        codename: 'manage_tasks',
        reason: 'Open ended',
      });
      h.clock.advance(2 * HOUR);

      const live = await h.overrides.listForUser('u-staff');
      const all = await h.overrides.listForUser('u-staff', { includeExpired: true });

      expect(live.success && live.data.map((o) => o.codename)).toEqual(['manage_tasks']);
      expect(all.success && all.data).toHaveLength(2);
    });
  });
});

describe('isOverrideActive', () => {
  const base = {
    id: 'ovr_1',
    userId: 'u-1',
    codename: 'manage_tasks',
    polarity: 'grant' as const,
    reason: 'test',
    createdBy: null,
    createdAt: TEST_NOW,
  };

  it('should treat a null expiry as permanent', () => {
    expect(isOverrideActive({ ...base, expiresAt: null }, TEST_NOW.getTime())).toBe(true);
  });

  it('should treat the expiry instant as expired', () => {
    expect(isOverrideActive({ ...base, expiresAt: TEST_NOW }, TEST_NOW.getTime())).toBe(
      false
    );
  });
});
