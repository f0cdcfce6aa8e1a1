import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from './errors.js';

export type AuditEvent =
  | 'auth.login'
  | 'auth.denied_admin'
  | 'user.create'
  | 'user.delete'
  | 'user.password'
  | 'index.rebuild'
  | 'fs.download'
  | 'fs.upload'
  | 'fs.rename'
  | 'fs.delete'
  | 'fs.mkdir';

export type AuditOutcome = 'success' | 'failure';

export interface AuditRecord {
  event: AuditEvent;
  actor: string;
  resource?: string;
  outcome: AuditOutcome;
  metadata?: Record<string, unknown>;
}

export interface AuditLoggerOptions {
  dir: string;
  retentionDays?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const PRUNE_EVERY_MS = 12 * 60 * 60 * 1000;
const DAY_FILE = /^(\d{4}-\d{2}-\d{2})\.jsonl$/;

/**
 * Append-only JSONL audit trail, one file per UTC day (`<dir>/YYYY-MM-DD.jsonl`).
 * Lines are written in the order `log` was called. A failed append is reported on
 * the console and does not affect the request that caused it.
 */
export class AuditLogger {
  private readonly dir: string;
  private readonly retentionMs: number;
  private tail: Promise<void> = Promise.resolve();
  private nextPruneAt = 0;

  constructor(options: AuditLoggerOptions) {
    this.dir = path.resolve(options.dir);
    const days = Math.min(3650, Math.max(1, Math.trunc(options.retentionDays ?? 90)));
    this.retentionMs = days * DAY_MS;
    fs.mkdirSync(this.dir, { recursive: true });
  }

  getDir(): string {
    return this.dir;
  }

  log(record: AuditRecord): void {
    const now = new Date();
    const line = JSON.stringify({
      timestamp: now.toISOString(),
      event: record.event,
      actor: record.actor,
      resource: record.resource ?? '',
      outcome: record.outcome,
      metadata: record.metadata ?? {}
    });
    const file = path.join(this.dir, `${now.toISOString().slice(0, 10)}.jsonl`);
    const prune = now.getTime() >= this.nextPruneAt;
    if (prune) {
      this.nextPruneAt = now.getTime() + PRUNE_EVERY_MS;
    }

    this.tail = this.tail
      .then(async () => {
        await fs.promises.appendFile(file, `${line}\n`, { encoding: 'utf8', mode: 0o600 });
        if (prune) {
          await this.pruneExpired(now.getTime());
        }
      })
      .catch((error: unknown) => {
        console.warn(`[treeserve] audit: write failed (${errorMessage(error)})`);
      });
  }

  /** Resolves once every record logged so far is on disk. */
  flush(): Promise<void> {
    return this.tail;
  }

  private async pruneExpired(nowMs: number): Promise<void> {
    const cutoff = nowMs - this.retentionMs;
    for (const name of await fs.promises.readdir(this.dir)) {
      const match = DAY_FILE.exec(name);
      if (!match || Date.parse(`${match[1]}T00:00:00Z`) + DAY_MS > cutoff) {
        continue;
      }
      try {
        await fs.promises.unlink(path.join(this.dir, name));
      } catch (error) {
        console.warn(`[treeserve] audit: could not remove ${name} (${errorMessage(error)})`);
      }
    }
  }
}
