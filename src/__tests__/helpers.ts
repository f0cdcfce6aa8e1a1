import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Application } from 'express';
import { createApp } from '../app.js';
import { AuditLogger } from '../audit-log.js';
import { AccessTokenService } from '../auth.js';
import { FileIndexManager } from '../file-index.js';
import { FileOperations } from '../file-ops.js';
import { MetricsRegistry } from '../metrics.js';
import { UserStore } from '../store.js';
import { UserService } from '../users.js';

export const TEST_SECRET = 'test-secret';
export const ADMIN_PASSWORD = 'test-admin-pass';

export interface TestServer {
  root: string;
  auditDir: string;
  store: UserStore;
  tokens: AccessTokenService;
  users: UserService;
  index: FileIndexManager;
  fileOps: FileOperations;
  auditLogger: AuditLogger;
  metrics: MetricsRegistry;
  app: Application;
  cleanup(): Promise<void>;
}

/** Writes `files` (relative path to content) under `root`; a trailing `/` makes a directory. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    if (relativePath.endsWith('/')) {
      await fs.mkdir(target, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `treeserve-${prefix}-`));
}

export async function createTestServer(
  files: Record<string, string>,
  options: { loginRateLimitMax?: number } = {}
): Promise<TestServer> {
  const root = await makeTempDir('root');
  const auditDir = await makeTempDir('audit');
  await writeTree(root, files);

  const store = new UserStore(':memory:');
  const tokens = new AccessTokenService({ signingSecret: TEST_SECRET });
  const users = new UserService({ repository: store, tokens });
  await users.bootstrapAdmin(ADMIN_PASSWORD);

  const metrics = new MetricsRegistry();
  const index = new FileIndexManager(root, {
    onBuilt: (snapshot, durationMs) => metrics.recordIndexBuild(snapshot, durationMs),
    onFailed: () => metrics.recordIndexFailure()
  });
  await index.rebuild();

  const auditLogger = new AuditLogger({ dir: auditDir });
  const fileOps = new FileOperations(index);
  const app = createApp({
    index,
    fileOps,
    users,
    tokens,
    auditLogger,
    metrics,
    loginRateLimitMax: options.loginRateLimitMax ?? 1000
  });

  return {
    root,
    auditDir,
    store,
    tokens,
    users,
    index,
    fileOps,
    auditLogger,
    metrics,
    app,
    cleanup: async () => {
      await index.whenIdle();
      await auditLogger.flush();
      store.close();
      metrics.dispose();
      await fs.rm(root, { recursive: true, force: true });
      await fs.rm(auditDir, { recursive: true, force: true });
    }
  };
}
