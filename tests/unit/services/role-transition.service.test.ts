/**
 * RoleTransitionService Unit Tests
 * Authority rules, commit order, notification and lock behaviour
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { userLockKey } from '@/services/mutation.js';
import { SYSTEM_ACTOR } from '@/types/index.js';

import { createHarness, TEST_NOW, userActor } from '../../helpers/harness.js';
import type { Harness } from '../../helpers/harness.js';

describe('RoleTransitionService', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    h.assign('u-staff', 'staff');
    h.assign('u-info', 'info_officer');
    h.assign('u-coord', 'coordinator');
    h.assign('u-admin', 'admin');
    h.assign('u-chief', 'chief_of_staff');
    h.assign('u-mp', 'mp');
    h.assign('u-super', 'superuser');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Authority
  // ─────────────────────────────────────────────────────────────────────────

  describe('authority', () => {
    it('should reject assigning a role above the actor level', async () => {
      const result = await h.transitions.transition(userActor('u-coord'), {
        targetUserId: 'u-staff',
        toRole: 'chief_of_staff',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INSUFFICIENT_AUTHORITY');
        expect(result.error.message).toBe(
          'Cannot assign chief_of_staff (level 8) from coordinator (level 6)'
        );
        expect(result.error.details).toEqual({ actorLevel: 6, targetLevel: 8 });
      }
      expect(h.store.userRoles.get('u-staff')?.roleId).toBe('staff');
      expect(h.store.audit).toHaveLength(0);
    });

    it('should reject assigning the actor own level', async () => {
      h.assign('u-new', 'registered_user');

      const result = await h.transitions.transition(userActor('u-coord'), {
        targetUserId: 'u-new',
        toRole: 'coordinator',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INSUFFICIENT_AUTHORITY');
      }
    });

    it('should reject changing a user at or above the actor level', async () => {
      const result = await h.transitions.transition(userActor('u-admin'), {
        targetUserId: 'u-chief',
        toRole: 'staff',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INSUFFICIENT_AUTHORITY');
        expect(result.error.details).toEqual({ actorLevel: 7, currentLevel: 8 });
      }
    });

    it('should reserve the top role for top-level actors', async () => {
      const result = await h.transitions.transition(userActor('u-mp'), {
        targetUserId: 'u-chief',
        toRole: 'superuser',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INSUFFICIENT_AUTHORITY');
        expect(result.error.message).toBe('Only a superuser may assign superuser');
      }
    });

    it('should let a top-level actor assign the top role', async () => {
      const result = await h.transitions.transition(userActor('u-super'), {
        targetUserId: 'u-mp',
        toRole: 'superuser',
      });

      expect(result.success).toBe(true);
      expect(h.store.userRoles.get('u-mp')?.roleId).toBe('superuser');
    });

    it('should reject raising the actor own role', async () => {
      const result = await h.transitions.transition(userActor('u-staff'), {
        targetUserId: 'u-staff',
        toRole: 'coordinator',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('SELF_ESCALATION');
      }
    });

    it('should allow lowering the actor own role', async () => {
      const result = await h.transitions.transition(userActor('u-coord'), {
        targetUserId: 'u-coord',
        toRole: 'staff',
      });

      expect(result.success).toBe(true);
      expect(h.store.userRoles.get('u-coord')?.roleId).toBe('staff');
    });

    it('should reject actors without a role', async () => {
      const result = await h.transitions.transition(userActor('u-nobody'), {
        targetUserId: 'u-staff',
        toRole: 'registered_user',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INSUFFICIENT_AUTHORITY');
        expect(result.error.message).toBe('Actor holds no role');
      }
    });

    it('should let the system actor bypass authority rules', async () => {
      const result = await h.transitions.transition(SYSTEM_ACTOR, {
        targetUserId: 'u-new',
        toRole: 'superuser',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.assignment.assignedBy).toBeNull();
      }
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Transition rules
  // ─────────────────────────────────────────────────────────────────────────

  describe('transition', () => {
    it('should reject an unknown target role', async () => {
      const result = await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-staff',
        toRole: 'emperor',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('UNKNOWN_TARGET_ROLE');
        expect(result.error.message).toBe('Role emperor does not exist');
      }
    });

    it('should reject assigning the role a user already holds', async () => {
      const result = await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-staff',
        toRole: 'staff',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_TRANSITION');
      }
    });

    it('should reject moves between roles on different branches', async () => {
      const result = await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-info',
        toRole: 'coordinator',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_TRANSITION');
        expect(result.error.details).toEqual({
          fromRole: 'info_officer',
          toRole: 'coordinator',
        });
      }
    });

    it('should assign a first role to a user without one', async () => {
      const result = await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-new',
        toRole: 'registered_user',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.fromRole).toBeNull();
        expect(result.data.toRole).toBe('registered_user');
      }
    });

    it('should persist, audit and notify a promotion', async () => {
      const result = await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-staff',
        toRole: 'coordinator',
        reason: 'Runs the outreach programme',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          userId: 'u-staff',
          fromRole: 'staff',
          toRole: 'coordinator',
          assignment: {
            userId: 'u-staff',
            roleId: 'coordinator',
            assignedBy: 'u-chief',
            assignedAt: TEST_NOW,
          },
        });
      }

      expect(h.store.audit).toHaveLength(1);
      expect(h.store.audit[0]).toMatchObject({
        sequence: 1,
        actorId: 'u-chief',
        action: 'role:assign',
        target: { type: 'user', id: 'u-staff' },
        before: { role: 'staff' },
        after: { role: 'coordinator' },
        reason: 'Runs the outreach programme',
        requestId: 'req-u-chief',
      });

      await vi.waitFor(() => {
        expect(h.notifier.notify).toHaveBeenCalledWith({
          userId: 'u-staff',
          oldRole: 'staff',
          newRole: 'coordinator',
          actorId: 'u-chief',
        });
      });
    });

    it('should invalidate the user permission cache', async () => {
      expect(await h.resolver.resolve('u-staff', 'manage_service_programs')).toBe(false);

      await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-staff',
        toRole: 'coordinator',
      });

      expect(await h.resolver.resolve('u-staff', 'manage_service_programs')).toBe(true);
    });

    it('should keep the change when the notification fails', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      h.notifier.notify.mockRejectedValueOnce(new Error('mail relay down'));

      const result = await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-staff',
        toRole: 'coordinator',
      });

      expect(result.success).toBe(true);
      expect(h.store.userRoles.get('u-staff')?.roleId).toBe('coordinator');
      await vi.waitFor(() => {
        expect(error).toHaveBeenCalledWith(
          'Role change notification failed for u-staff (staff -> coordinator):',
          expect.any(Error)
        );
      });
    });

    it('should keep the change when the audit write fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(h.dbs.audit, 'appendEntry').mockRejectedValueOnce(new Error('audit down'));

      const result = await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-staff',
        toRole: 'coordinator',
      });

      expect(result.success).toBe(true);
      expect(h.store.userRoles.get('u-staff')?.roleId).toBe('coordinator');
      expect(h.auditService.getHealth()).toEqual({
        pending: 1,
        dropped: 0,
        healthy: false,
      });
    });

    it('should report a retryable failure when the user is locked', async () => {
      let finish = (): void => undefined;
      const holding = h.lock.run(
        userLockKey('u-staff'),
        () =>
          new Promise<void>((resolve) => {
            finish = resolve;
          })
      );

      const result = await h.transitions.transition(
        userActor('u-chief'),
        { targetUserId: 'u-staff', toRole: 'coordinator' },
        { timeoutMs: 20 }
      );
      finish();
      await holding;

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('TRANSIENT_FAILURE');
        expect(result.error.details).toEqual({ key: 'user:u-staff', timeoutMs: 20 });
      }
      expect(h.store.userRoles.get('u-staff')?.roleId).toBe('staff');
    });

    it('should serialise concurrent changes to one user', async () => {
      const [first, second] = await Promise.all([
        h.transitions.transition(userActor('u-chief'), {
          targetUserId: 'u-staff',
          toRole: 'coordinator',
        }),
        h.transitions.transition(userActor('u-chief'), {
          targetUserId: 'u-staff',
          toRole: 'coordinator',
        }),
      ]);

      expect(first.success).toBe(true);
      expect(second.success).toBe(false);
      if (!second.success) {
        expect(second.error.code).toBe('INVALID_TRANSITION');
      }
      expect(h.store.audit).toHaveLength(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Removal and history
  // ─────────────────────────────────────────────────────────────────────────

  describe('removeRole', () => {
    it('should take the role away and audit it', async () => {
      const result = await h.transitions.removeRole(userActor('u-chief'), {
        targetUserId: 'u-staff',
        reason: 'Left the office',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.fromRole).toBe('staff');
        expect(result.data.toRole).toBeNull();
      }
      expect(h.store.userRoles.get('u-staff')?.roleId).toBeNull();
      expect(h.store.audit[0]).toMatchObject({
        action: 'role:remove',
        before: { role: 'staff' },
        after: { role: null },
      });
      expect(await h.resolver.resolve('u-staff', 'manage_tasks')).toBe(false);
    });

    it('should return NOT_FOUND for a user without a role', async () => {
      const result = await h.transitions.removeRole(userActor('u-chief'), {
        targetUserId: 'u-nobody',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NOT_FOUND');
        expect(result.error.message).toBe('User u-nobody holds no role');
      }
    });

    it('should reject removing a senior user role', async () => {
      const result = await h.transitions.removeRole(userActor('u-coord'), {
        targetUserId: 'u-admin',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INSUFFICIENT_AUTHORITY');
      }
    });
  });

  describe('history', () => {
    it('should list role changes of a user in order', async () => {
      await h.transitions.transition(userActor('u-chief'), {
        targetUserId: 'u-staff',
        toRole: 'coordinator',
      });
      await h.overrides.grant(userActor('u-chief'), {
        userId: 'u-staff',
        codename: 'view_audit_logs',
        reason: 'Audit support',
      });
      await h.transitions.removeRole(userActor('u-chief'), { targetUserId: 'u-staff' });

      const result = await h.transitions.listTransitions('u-staff');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.map((entry) => entry.action)).toEqual([
          'role:assign',
          'role:remove',
        ]);
        expect(result.data.map((entry) => entry.sequence)).toEqual([1, 3]);
      }
    });

    it('should read the current role', async () => {
      const result = await h.transitions.getUserRole('u-admin');

      expect(result).toEqual({ success: true, data: 'admin' });
    });
  });
});
