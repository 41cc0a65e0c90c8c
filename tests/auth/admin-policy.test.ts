import { describe, test, expect } from '@jest/globals';
import { AdminPolicy } from '../../src/auth/admin-policy';
import { seedTestData, withDatabase } from '../utils/test-database';

describe('AdminPolicy', () => {
  test('should have no admin before anyone registers', async () => {
    await withDatabase(async (db) => {
      const policy = new AdminPolicy(db);

      expect(await policy.getAdminId()).toBeNull();
      expect(await policy.isAdmin(null)).toBe(false);
    });
  });

  test('should treat the first registered user as the admin', async () => {
    await withDatabase(async (db) => {
      const { users } = await seedTestData(db);
      const policy = new AdminPolicy(db);

      expect(await policy.getAdminId()).toBe(users.admin.id);
      expect(await policy.isAdmin(users.admin)).toBe(true);
      expect(await policy.isAdmin(users.reader)).toBe(false);
    });
  });

  test('should prefer a configured admin id', async () => {
    await withDatabase(async (db) => {
      const { users } = await seedTestData(db);
      const policy = new AdminPolicy(db, users.reader.id);

      expect(await policy.isAdmin(users.reader)).toBe(true);
      expect(await policy.isAdmin(users.admin)).toBe(false);
    });
  });
});
