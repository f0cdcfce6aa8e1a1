#!/usr/bin/env node
import 'dotenv/config';
import fs from 'node:fs';
import http from 'node:http';
import { createApp } from './app.js';
import { AuditLogger } from './audit-log.js';
import { AccessTokenService } from './auth.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { FileIndexManager } from './file-index.js';
import { FileOperations } from './file-ops.js';
import { MetricsRegistry } from './metrics.js';
import { UserStore } from './store.js';
import { UserService } from './users.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function main(): Promise<void> {
  const { config, warnings } = loadConfig();
  for (const warning of warnings) {
    console.warn(`[treeserve] config: ${warning}`);
  }

  fs.mkdirSync(config.serveDir, { recursive: true });

  const metrics = new MetricsRegistry();
  const auditLogger = new AuditLogger({ dir: config.auditDir, retentionDays: config.auditRetentionDays });
  const store = new UserStore(config.dbPath);
  const tokens = new AccessTokenService({
    signingSecret: config.signingSecret,
    ttlSeconds: config.tokenTtlSeconds
  });
  const users = new UserService({ repository: store, tokens });

  const admin = await users.bootstrapAdmin(config.adminPassword);
  if (admin) {
    console.log(`[treeserve] auth: created default admin user (username: ${admin.username})`);
  }

  const index = new FileIndexManager(config.serveDir, {
    onBuilt: (snapshot, durationMs) => {
      metrics.recordIndexBuild(snapshot, durationMs);
    },
    onFailed: () => {
      metrics.recordIndexFailure();
    }
  });
  console.log(`[treeserve] index: indexing ${config.serveDir}`);
  const snapshot = await index.rebuild();
  console.log(
    `[treeserve] index: ${snapshot.totalFiles} files and ${snapshot.directories.length} directories (${snapshot.totalSize} bytes)`
  );

  const app = createApp({
    index,
    fileOps: new FileOperations(index),
    users,
    tokens,
    auditLogger,
    metrics,
    loginRateLimitMax: config.loginRateLimitMax,
    staticDir: config.staticDir
  });

  const server = http.createServer(app);

  const shutdown = (signal: string): void => {
    console.log(`[treeserve] received ${signal}, shutting down`);
    const timer = setTimeout(() => {
      console.warn('[treeserve] shutdown timed out, exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    server.close(() => {
      Promise.all([index.whenIdle(), auditLogger.flush()])
        .then(() => {
          store.close();
          metrics.dispose();
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error(`[treeserve] shutdown failed (${errorMessage(error)})`);
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(config.port, () => {
    console.log(`[treeserve] listening on ${config.port}`);
    console.log(`[treeserve] serving: ${config.serveDir}`);
    console.log(`[treeserve] user store: ${store.getDbPath()}`);
  });
}

main().catch((error: unknown) => {
  console.error(`[treeserve] startup failed (${errorMessage(error)})`);
  process.exit(1);
});
