import type { AccessTokenService } from './auth.js';
import { BadRequestError, NotFoundError, UnauthorizedError } from './errors.js';
import { hashPassword, verifyPassword } from './passwords.js';
import { toPublicUser, type PublicUser, type UserRecord, type UserRepository } from './store.js';

export const BOOTSTRAP_ADMIN_USERNAME = 'admin';
export const MIN_PASSWORD_LENGTH = 6;

export interface LoginResult {
  token: string;
  expiresAt: string;
  user: {
    id: number;
    username: string;
    isAdmin: boolean;
  };
}

export interface CreateUserInput {
  username: string;
  password: string;
  isAdmin: boolean;
}

export interface UserServiceOptions {
  repository: UserRepository;
  tokens: AccessTokenService;
}

export class UserService {
  private readonly repository: UserRepository;
  private readonly tokens: AccessTokenService;
  private dummyHash: Promise<string> | null = null;

  constructor(options: UserServiceOptions) {
    this.repository = options.repository;
    this.tokens = options.tokens;
  }

  /**
   * Creates the `admin` account when no users exist yet. Returns the created user,
   * or null when the table was already populated.
   */
  async bootstrapAdmin(password: string): Promise<PublicUser | null> {
    if (this.repository.countUsers() > 0) {
      return null;
    }
    const created = this.repository.createUser({
      username: BOOTSTRAP_ADMIN_USERNAME,
      passwordHash: await hashPassword(password),
      isAdmin: true
    });
    return toPublicUser(created);
  }

  /** Unknown usernames and wrong passwords fail identically. */
  async login(username: string, password: string): Promise<LoginResult> {
    const user = this.repository.getUserByUsername(username);
    if (!user) {
      // keep the unknown-user path as expensive as a real comparison
      await verifyPassword(password, await this.getDummyHash());
      throw new UnauthorizedError('Invalid credentials');
    }
    if (!(await verifyPassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid credentials');
    }

    const issued = this.tokens.issueAccessToken(user);
    return {
      token: issued.token,
      expiresAt: issued.expiresAt,
      user: {
        id: user.id,
        username: user.username,
        isAdmin: user.isAdmin
      }
    };
  }

  async createUser(input: CreateUserInput): Promise<PublicUser> {
    const username = input.username.trim();
    if (!username) {
      throw new BadRequestError('Username is required');
    }
    if (input.password.length < MIN_PASSWORD_LENGTH) {
      throw new BadRequestError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    const created = this.repository.createUser({
      username,
      passwordHash: await hashPassword(input.password),
      isAdmin: input.isAdmin
    });
    return toPublicUser(created);
  }

  listUsers(): PublicUser[] {
    return this.repository.listUsers().map(toPublicUser);
  }

  deleteUser(id: number): void {
    const user = this.repository.getUserById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    if (user.isAdmin && this.repository.countAdmins() <= 1) {
      throw new BadRequestError('Cannot delete the last admin user');
    }
    if (!this.repository.deleteUser(id)) {
      throw new NotFoundError('User not found');
    }
  }

  async changePassword(userId: number, currentPassword: string, newPassword: string): Promise<void> {
    if (newPassword.length < MIN_PASSWORD_LENGTH) {
      throw new BadRequestError(`New password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    const user: UserRecord | undefined = this.repository.getUserById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    if (!(await verifyPassword(currentPassword, user.passwordHash))) {
      throw new BadRequestError('Current password is incorrect');
    }
    if (!this.repository.updatePasswordHash(user.id, await hashPassword(newPassword))) {
      throw new NotFoundError('User not found');
    }
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = hashPassword('treeserve-unknown-user');
    }
    return this.dummyHash;
  }
}
