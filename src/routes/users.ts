import type { Application, Request, RequestHandler, Response } from 'express';
import type { AuditLogger } from '../audit-log.js';
import { describeActor, getAuthContext } from '../auth.js';
import { BadRequestError, errorMessage, UnauthorizedError, wrapAsync } from '../errors.js';
import type { MetricsRegistry } from '../metrics.js';
import { getClientIp } from '../security.js';
import type { UserService } from '../users.js';

interface UserRouteDeps {
  users: UserService;
  auditLogger: AuditLogger;
  metrics: MetricsRegistry;
}

function readStringBodyField(body: unknown, key: string): string | undefined {
  if (!body || typeof body !== 'object') {
    return undefined;
  }
  const candidate = (body as Record<string, unknown>)[key];
  return typeof candidate === 'string' ? candidate : undefined;
}

function readBooleanBodyField(body: unknown, key: string, fallback: boolean): boolean {
  if (!body || typeof body !== 'object') {
    return fallback;
  }
  const candidate = (body as Record<string, unknown>)[key];
  return typeof candidate === 'boolean' ? candidate : fallback;
}

function parseUserId(raw: string | undefined): number {
  if (!raw || !/^\d+$/.test(raw)) {
    throw new BadRequestError('Invalid user ID');
  }
  const id = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new BadRequestError('Invalid user ID');
  }
  return id;
}

/** Public: the only route reachable without a bearer token besides health. */
export function registerLoginRoute(
  app: Application,
  deps: UserRouteDeps & { rateLimit: RequestHandler }
): void {
  const { users, auditLogger, metrics, rateLimit } = deps;

  app.post(
    '/api/login',
    rateLimit,
    wrapAsync(async (req: Request, res: Response) => {
      const username = readStringBodyField(req.body, 'username');
      const password = readStringBodyField(req.body, 'password');
      if (!username || !password) {
        throw new BadRequestError('username and password are required');
      }

      try {
        const result = await users.login(username, password);
        metrics.recordLoginSuccess();
        auditLogger.log({
          event: 'auth.login',
          actor: `user:${result.user.id}:${result.user.username}`,
          outcome: 'success',
          metadata: { ip: getClientIp(req) }
        });
        res.json(result);
      } catch (error) {
        if (error instanceof UnauthorizedError) {
          metrics.recordAuthFailure('credentials');
        }
        auditLogger.log({
          event: 'auth.login',
          actor: `username:${username}`,
          outcome: 'failure',
          metadata: { ip: getClientIp(req), reason: errorMessage(error) }
        });
        throw error;
      }
    })
  );
}

/** Expects the access middleware to already guard `/api`. */
export function registerUserRoutes(app: Application, deps: UserRouteDeps & { adminOnly: RequestHandler }): void {
  const { users, auditLogger, adminOnly } = deps;

  app.post(
    '/api/users',
    adminOnly,
    wrapAsync(async (req: Request, res: Response) => {
      const username = readStringBodyField(req.body, 'username');
      const password = readStringBodyField(req.body, 'password');
      if (username === undefined || password === undefined) {
        throw new BadRequestError('username and password are required');
      }
      const isAdmin = readBooleanBodyField(req.body, 'isAdmin', false);

      try {
        const created = await users.createUser({ username, password, isAdmin });
        auditLogger.log({
          event: 'user.create',
          actor: describeActor(res),
          resource: `user:${created.id}:${created.username}`,
          outcome: 'success',
          metadata: { isAdmin: created.isAdmin }
        });
        res.status(201).json({
          id: created.id,
          username: created.username,
          isAdmin: created.isAdmin,
          createdAt: created.createdAt
        });
      } catch (error) {
        auditLogger.log({
          event: 'user.create',
          actor: describeActor(res),
          resource: `username:${username}`,
          outcome: 'failure',
          metadata: { reason: errorMessage(error) }
        });
        throw error;
      }
    })
  );

  app.get('/api/users', adminOnly, (_req: Request, res: Response) => {
    res.json(users.listUsers());
  });

  app.delete('/api/users/:id', adminOnly, (req: Request, res: Response) => {
    const id = parseUserId(req.params.id);
    try {
      users.deleteUser(id);
    } catch (error) {
      auditLogger.log({
        event: 'user.delete',
        actor: describeActor(res),
        resource: `user:${id}`,
        outcome: 'failure',
        metadata: { reason: errorMessage(error) }
      });
      throw error;
    }
    auditLogger.log({
      event: 'user.delete',
      actor: describeActor(res),
      resource: `user:${id}`,
      outcome: 'success'
    });
    res.json({ message: 'User deleted successfully' });
  });

  app.get('/api/me', (_req: Request, res: Response) => {
    const { claims } = getAuthContext(res);
    res.json({
      id: claims.userId,
      username: claims.username,
      isAdmin: claims.isAdmin
    });
  });

  app.put(
    '/api/me/password',
    wrapAsync(async (req: Request, res: Response) => {
      const { claims } = getAuthContext(res);
      const currentPassword = readStringBodyField(req.body, 'currentPassword');
      const newPassword = readStringBodyField(req.body, 'newPassword');
      if (!currentPassword || newPassword === undefined) {
        throw new BadRequestError('currentPassword and newPassword are required');
      }

      try {
        await users.changePassword(claims.userId, currentPassword, newPassword);
      } catch (error) {
        auditLogger.log({
          event: 'user.password',
          actor: describeActor(res),
          outcome: 'failure',
          metadata: { reason: errorMessage(error) }
        });
        throw error;
      }
      auditLogger.log({
        event: 'user.password',
        actor: describeActor(res),
        outcome: 'success'
      });
      res.json({ message: 'Password changed successfully' });
    })
  );
}
