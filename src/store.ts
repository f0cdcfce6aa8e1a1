import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { ConflictError } from './errors.js';

export interface UserRecord {
  id: number;
  username: string;
  passwordHash: string;
  isAdmin: boolean;
  createdAt: string;
  updatedAt: string;
}

export type PublicUser = Omit<UserRecord, 'passwordHash'>;

export interface NewUser {
  username: string;
  passwordHash: string;
  isAdmin: boolean;
}

/** The narrow surface the auth layer needs from durable user storage. */
export interface UserRepository {
  countUsers(): number;
  countAdmins(): number;
  createUser(user: NewUser): UserRecord;
  getUserById(id: number): UserRecord | undefined;
  getUserByUsername(username: string): UserRecord | undefined;
  listUsers(): UserRecord[];
  deleteUser(id: number): boolean;
  updatePasswordHash(id: number, passwordHash: string): boolean;
}

const IN_MEMORY = ':memory:';

function toInt(value: unknown, fallback = 0): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.trunc(parsed);
}

function toStringValue(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function ensureDirectoryFor(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

function resolveStorePath(rawPath: string): string {
  if (rawPath === IN_MEMORY) {
    return rawPath;
  }
  return path.resolve(rawPath.trim() || 'filebrowser.db');
}

function isUniqueViolation(error: unknown): boolean {
  return (
    !!error &&
    typeof error === 'object' &&
    (error as { code?: unknown }).code === 'SQLITE_CONSTRAINT_UNIQUE'
  );
}

function rowToUser(row: Record<string, unknown>): UserRecord {
  return {
    id: toInt(row.id),
    username: toStringValue(row.username),
    passwordHash: toStringValue(row.password_hash),
    isAdmin: toInt(row.is_admin) === 1,
    createdAt: toStringValue(row.created_at),
    updatedAt: toStringValue(row.updated_at)
  };
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    isAdmin: user.isAdmin,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt
  };
}

export class UserStore implements UserRepository {
  private readonly filePath: string;
  private readonly db: Database.Database;

  constructor(filePath: string) {
    this.filePath = resolveStorePath(filePath);
    const inMemory = this.filePath === IN_MEMORY;
    const dbExisted = inMemory || fs.existsSync(this.filePath);

    if (!inMemory) {
      ensureDirectoryFor(this.filePath);
    }
    this.db = new Database(this.filePath);
    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');

    this.initSchema();
    if (!dbExisted) {
      try {
        fs.chmodSync(this.filePath, 0o600);
      } catch (error) {
        console.warn(`[treeserve] store: chmod 600 failed for ${this.filePath} (${String(error)})`);
      }
    }
  }

  getDbPath(): string {
    return this.filePath;
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        is_admin INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_users_is_admin ON users(is_admin);
    `);
  }

  countUsers(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM users').get() as Record<string, unknown> | undefined;
    return toInt(row?.count);
  }

  countAdmins(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM users WHERE is_admin = 1').get() as
      | Record<string, unknown>
      | undefined;
    return toInt(row?.count);
  }

  createUser(user: NewUser): UserRecord {
    const now = new Date().toISOString();
    let id: number;
    try {
      const result = this.db
        .prepare(
          `INSERT INTO users (username, password_hash, is_admin, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(user.username, user.passwordHash, user.isAdmin ? 1 : 0, now, now);
      id = toInt(result.lastInsertRowid);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Username already exists');
      }
      throw error;
    }

    return {
      id,
      username: user.username,
      passwordHash: user.passwordHash,
      isAdmin: user.isAdmin,
      createdAt: now,
      updatedAt: now
    };
  }

  getUserById(id: number): UserRecord | undefined {
    const row = this.db
      .prepare('SELECT id, username, password_hash, is_admin, created_at, updated_at FROM users WHERE id = ?')
      .get(id) as Record<string, unknown> | undefined;
    return row ? rowToUser(row) : undefined;
  }

  getUserByUsername(username: string): UserRecord | undefined {
    const row = this.db
      .prepare('SELECT id, username, password_hash, is_admin, created_at, updated_at FROM users WHERE username = ?')
      .get(username) as Record<string, unknown> | undefined;
    return row ? rowToUser(row) : undefined;
  }

  listUsers(): UserRecord[] {
    const rows = this.db
      .prepare('SELECT id, username, password_hash, is_admin, created_at, updated_at FROM users ORDER BY id ASC')
      .all() as Array<Record<string, unknown>>;
    return rows.map(rowToUser);
  }

  deleteUser(id: number): boolean {
    const result = this.db.prepare('DELETE FROM users WHERE id = ?').run(id);
    return result.changes > 0;
  }

  updatePasswordHash(id: number, passwordHash: string): boolean {
    const result = this.db
      .prepare('UPDATE users SET password_hash = ?, updated_at = ? WHERE id = ?')
      .run(passwordHash, new Date().toISOString(), id);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
