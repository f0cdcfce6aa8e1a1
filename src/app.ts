import fs from 'node:fs';
import path from 'node:path';
import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import type { AuditLogger } from './audit-log.js';
import { createAccessAuthMiddleware, describeActor, requireAdmin, type AccessTokenService } from './auth.js';
import { createErrorMiddleware, NotFoundError, respondError } from './errors.js';
import type { FileIndexManager } from './file-index.js';
import type { FileOperations } from './file-ops.js';
import type { MetricsRegistry } from './metrics.js';
import { registerApiRoutes } from './routes/api.js';
import { registerLoginRoute, registerUserRoutes } from './routes/users.js';
import { createRateLimitMiddleware, MemoryRateLimiter } from './security.js';
import type { UserService } from './users.js';

const LOGIN_RATE_LIMIT_WINDOW_MS = 60_000;

export interface AppDeps {
  index: FileIndexManager;
  fileOps: FileOperations;
  users: UserService;
  tokens: AccessTokenService;
  auditLogger: AuditLogger;
  metrics: MetricsRegistry;
  loginRateLimitMax: number;
  staticDir?: string;
}

function mountStaticClient(app: Application, staticDir: string): void {
  const indexHtml = path.join(staticDir, 'index.html');
  app.use(express.static(staticDir));
  app.get('*', (req: Request, res: Response, next: NextFunction) => {
    if (req.path.startsWith('/api/') || !fs.existsSync(indexHtml)) {
      next();
      return;
    }
    res.sendFile(indexHtml);
  });
}

export function createApp(deps: AppDeps): Application {
  const { index, users, tokens, auditLogger, metrics } = deps;
  const app = express();

  app.set('trust proxy', 'loopback, linklocal, uniquelocal');
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req: Request, res: Response) => {
    const snapshot = index.current();
    res.json({
      status: 'ok',
      uptimeSec: metrics.getUptimeSec(),
      index: {
        lastIndexed: snapshot.lastIndexed,
        totalFiles: snapshot.totalFiles,
        totalSize: snapshot.totalSize
      }
    });
  });

  const loginLimiter = new MemoryRateLimiter({
    windowMs: LOGIN_RATE_LIMIT_WINDOW_MS,
    max: deps.loginRateLimitMax
  });
  registerLoginRoute(app, {
    users,
    auditLogger,
    metrics,
    rateLimit: createRateLimitMiddleware(loginLimiter, { message: 'Too many login attempts' })
  });

  app.use(
    '/api',
    createAccessAuthMiddleware(tokens, {
      onFailure: (_req, reason) => {
        metrics.recordAuthFailure(reason);
      }
    })
  );

  const adminOnly = requireAdmin({
    onDenied: (req, res) => {
      auditLogger.log({
        event: 'auth.denied_admin',
        actor: describeActor(res),
        resource: req.originalUrl,
        outcome: 'failure'
      });
    }
  });

  registerUserRoutes(app, { users, auditLogger, metrics, adminOnly });
  registerApiRoutes(app, {
    index,
    fileOps: deps.fileOps,
    auditLogger,
    metrics,
    adminOnly
  });

  app.use('/api', (_req: Request, res: Response) => {
    respondError(res, new NotFoundError('Not found'));
  });

  if (deps.staticDir && fs.existsSync(deps.staticDir)) {
    mountStaticClient(app, deps.staticDir);
  }

  app.use(createErrorMiddleware());
  return app;
}
