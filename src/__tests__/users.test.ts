import { AccessTokenService } from '../auth.js';
import { BadRequestError, ConflictError, NotFoundError, UnauthorizedError } from '../errors.js';
import { UserStore } from '../store.js';
import { BOOTSTRAP_ADMIN_USERNAME, UserService } from '../users.js';
import { ADMIN_PASSWORD, TEST_SECRET } from './helpers.js';

describe('UserService', () => {
  let store: UserStore;
  let tokens: AccessTokenService;
  let users: UserService;

  beforeEach(() => {
    store = new UserStore(':memory:');
    tokens = new AccessTokenService({ signingSecret: TEST_SECRET });
    users = new UserService({ repository: store, tokens });
  });

  afterEach(() => {
    store.close();
  });

  describe('bootstrapAdmin', () => {
    it('creates the admin account only while the store is empty', async () => {
      const created = await users.bootstrapAdmin(ADMIN_PASSWORD);

      expect(created).toMatchObject({ id: 1, username: BOOTSTRAP_ADMIN_USERNAME, isAdmin: true });
      expect(created).not.toHaveProperty('passwordHash');
      await expect(users.bootstrapAdmin('another-pass')).resolves.toBeNull();
      expect(store.countUsers()).toBe(1);
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await users.bootstrapAdmin(ADMIN_PASSWORD);
    });

    it('returns a token bound to the user', async () => {
      const result = await users.login('admin', ADMIN_PASSWORD);

      expect(result.user).toEqual({ id: 1, username: 'admin', isAdmin: true });
      const verdict = tokens.verifyAccessToken(result.token);
      expect(verdict.ok && verdict.claims.userId).toBe(1);
      expect(verdict.ok && verdict.expiresAt).toBe(result.expiresAt);
    });

    it('fails the same way for a wrong password and an unknown user', async () => {
      await expect(users.login('admin', 'wrong-pass')).rejects.toThrow(new UnauthorizedError('Invalid credentials'));
      await expect(users.login('nobody', 'wrong-pass')).rejects.toThrow(new UnauthorizedError('Invalid credentials'));
    });
  });

  describe('createUser', () => {
    it('trims the username and stores a hash', async () => {
      const created = await users.createUser({ username: '  bob ', password: 'bob-pass', isAdmin: false });

      expect(created.username).toBe('bob');
      expect(store.getUserByUsername('bob')?.passwordHash.startsWith('scrypt$')).toBe(true);
      await expect(users.login('bob', 'bob-pass')).resolves.toMatchObject({ user: { username: 'bob' } });
    });

    it('validates username and password length', async () => {
      await expect(users.createUser({ username: '   ', password: 'long-enough', isAdmin: false })).rejects.toThrow(
        'Username is required'
      );
      await expect(users.createUser({ username: 'carol', password: '12345', isAdmin: false })).rejects.toThrow(
        'Password must be at least 6 characters'
      );
    });

    it('rejects duplicate usernames', async () => {
      await users.createUser({ username: 'dave', password: 'dave-pass', isAdmin: false });

      await expect(users.createUser({ username: 'dave', password: 'other-pass', isAdmin: true })).rejects.toThrow(
        ConflictError
      );
      expect(store.countUsers()).toBe(1);
    });
  });

  describe('deleteUser', () => {
    beforeEach(async () => {
      await users.bootstrapAdmin(ADMIN_PASSWORD);
    });

    it('refuses to delete the last admin and leaves the store unchanged', async () => {
      await users.createUser({ username: 'erin', password: 'erin-pass', isAdmin: false });

      expect(() => users.deleteUser(1)).toThrow(new BadRequestError('Cannot delete the last admin user'));
      expect(store.countUsers()).toBe(2);
      expect(store.countAdmins()).toBe(1);
    });

    it('deletes an admin when another admin remains', async () => {
      const second = await users.createUser({ username: 'frank', password: 'frank-pass', isAdmin: true });

      users.deleteUser(1);

      expect(users.listUsers().map((user) => user.id)).toEqual([second.id]);
      expect(store.countAdmins()).toBe(1);
    });

    it('deletes regular users', async () => {
      const regular = await users.createUser({ username: 'gina', password: 'gina-pass', isAdmin: false });

      users.deleteUser(regular.id);

      expect(store.getUserById(regular.id)).toBeUndefined();
    });

    it('reports unknown ids', () => {
      expect(() => users.deleteUser(99)).toThrow(NotFoundError);
    });
  });

  describe('changePassword', () => {
    beforeEach(async () => {
      await users.bootstrapAdmin(ADMIN_PASSWORD);
    });

    it('replaces the hash after checking the current password', async () => {
      await users.changePassword(1, ADMIN_PASSWORD, 'new-admin-pass');

      await expect(users.login('admin', 'new-admin-pass')).resolves.toMatchObject({ user: { id: 1 } });
      await expect(users.login('admin', ADMIN_PASSWORD)).rejects.toThrow(UnauthorizedError);
    });

    it('checks the new length before the current password', async () => {
      await expect(users.changePassword(1, 'wrong-pass', 'short')).rejects.toThrow(
        'New password must be at least 6 characters'
      );
    });

    it('rejects a wrong current password', async () => {
      await expect(users.changePassword(1, 'wrong-pass', 'new-admin-pass')).rejects.toThrow(
        'Current password is incorrect'
      );
    });

    it('reports a missing account', async () => {
      await expect(users.changePassword(42, ADMIN_PASSWORD, 'new-admin-pass')).rejects.toThrow('User not found');
    });
  });
});
