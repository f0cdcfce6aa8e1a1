import { createHmac, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { ForbiddenError, UnauthorizedError, respondError } from './errors.js';

const TOKEN_PREFIX = 'v1';
const TTL_DEFAULT_SECONDS = 24 * 60 * 60;
const TTL_MIN_SECONDS = 60;
const TTL_MAX_SECONDS = 7 * 24 * 60 * 60;

export interface TokenSubject {
  id: number;
  username: string;
  isAdmin: boolean;
}

/** Times are unix seconds. */
export interface AccessTokenClaims {
  userId: number;
  username: string;
  isAdmin: boolean;
  iat: number;
  exp: number;
}

export interface IssuedToken {
  token: string;
  claims: AccessTokenClaims;
  expiresAt: string;
}

export type TokenRejection = 'missing' | 'invalid_format' | 'invalid_payload' | 'signature_mismatch' | 'expired';

export type TokenVerdict =
  | { ok: true; claims: AccessTokenClaims; expiresAt: string }
  | { ok: false; code: TokenRejection };

export interface AuthContext {
  token: string;
  claims: AccessTokenClaims;
  expiresAt: string;
}

export interface AccessTokenServiceOptions {
  signingSecret: string;
  ttlSeconds?: number;
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

function isoFromUnix(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

function clampTtl(seconds: number | undefined): number {
  if (seconds === undefined || !Number.isFinite(seconds)) {
    return TTL_DEFAULT_SECONDS;
  }
  return Math.min(TTL_MAX_SECONDS, Math.max(TTL_MIN_SECONDS, Math.trunc(seconds)));
}

function signaturesMatch(actual: string, expected: string): boolean {
  const actualBytes = Buffer.from(actual, 'utf8');
  const expectedBytes = Buffer.from(expected, 'utf8');
  return actualBytes.length === expectedBytes.length && timingSafeEqual(actualBytes, expectedBytes);
}

function readClaims(encoded: string): AccessTokenClaims | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  if (!decoded || typeof decoded !== 'object') {
    return null;
  }
  const { userId, username, isAdmin, iat, exp } = decoded as Record<string, unknown>;
  if (
    typeof userId !== 'number' ||
    !Number.isInteger(userId) ||
    typeof username !== 'string' ||
    typeof isAdmin !== 'boolean' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number' ||
    !Number.isFinite(iat) ||
    !Number.isFinite(exp)
  ) {
    return null;
  }
  return { userId, username, isAdmin, iat: Math.trunc(iat), exp: Math.trunc(exp) };
}

/**
 * Stateless HMAC-SHA256 bearer tokens shaped `v1.<claims>.<signature>`, both parts
 * base64url. Nothing is kept server-side: a token is good until its `exp`.
 */
export class AccessTokenService {
  private readonly secret: string;
  private readonly ttlSeconds: number;

  constructor(options: AccessTokenServiceOptions) {
    this.secret = options.signingSecret;
    this.ttlSeconds = clampTtl(options.ttlSeconds);
  }

  getTtlSeconds(): number {
    return this.ttlSeconds;
  }

  issueAccessToken(subject: TokenSubject): IssuedToken {
    const iat = unixNow();
    const claims: AccessTokenClaims = {
      userId: subject.id,
      username: subject.username,
      isAdmin: subject.isAdmin,
      iat,
      exp: iat + this.ttlSeconds
    };
    const body = Buffer.from(JSON.stringify(claims), 'utf8').toString('base64url');
    return {
      token: [TOKEN_PREFIX, body, this.sign(body)].join('.'),
      claims,
      expiresAt: isoFromUnix(claims.exp)
    };
  }

  /** The signature is checked before the claims are parsed. */
  verifyAccessToken(token: string): TokenVerdict {
    if (!token) {
      return { ok: false, code: 'missing' };
    }
    const segments = token.split('.');
    if (segments.length !== 3 || segments[0] !== TOKEN_PREFIX || !segments[1] || !segments[2]) {
      return { ok: false, code: 'invalid_format' };
    }
    const [, body, signature] = segments;
    if (!signaturesMatch(signature, this.sign(body))) {
      return { ok: false, code: 'signature_mismatch' };
    }
    const claims = readClaims(body);
    if (!claims) {
      return { ok: false, code: 'invalid_payload' };
    }
    if (claims.exp <= unixNow()) {
      return { ok: false, code: 'expired' };
    }
    return { ok: true, claims, expiresAt: isoFromUnix(claims.exp) };
  }

  private sign(body: string): string {
    return createHmac('sha256', this.secret).update(body).digest('base64url');
  }
}

/** `Bearer <token>` (any case) or a bare token; blank values read as absent. */
export function extractBearerToken(header: unknown): string | null {
  if (typeof header !== 'string') {
    return null;
  }
  const trimmed = header.trim();
  const scheme = /^bearer(?:\s+(.*))?$/i.exec(trimmed);
  const token = scheme ? (scheme[1] ?? '') : trimmed;
  return token.length > 0 ? token : null;
}

function readAuthContext(res: Response): AuthContext | null {
  const auth: unknown = res.locals.auth;
  if (!auth || typeof auth !== 'object' || !('claims' in auth)) {
    return null;
  }
  return auth as AuthContext;
}

/** Set by the access middleware on every request it lets through. */
export function getAuthContext(res: Response): AuthContext {
  const context = readAuthContext(res);
  if (!context) {
    throw new UnauthorizedError('Authorization required');
  }
  return context;
}

export function describeActor(res: Response): string {
  const context = readAuthContext(res);
  return context ? `user:${context.claims.userId}:${context.claims.username}` : 'anonymous';
}

export function createAccessAuthMiddleware(
  tokens: AccessTokenService,
  hooks: { onFailure?: (req: Request, reason: TokenRejection) => void } = {}
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (header === undefined) {
      hooks.onFailure?.(req, 'missing');
      respondError(res, new UnauthorizedError('Authorization header required'));
      return;
    }

    const token = extractBearerToken(header) ?? '';
    const verdict = tokens.verifyAccessToken(token);
    if (!verdict.ok) {
      hooks.onFailure?.(req, verdict.code);
      respondError(res, new UnauthorizedError('Invalid token'));
      return;
    }

    const context: AuthContext = { token, claims: verdict.claims, expiresAt: verdict.expiresAt };
    res.locals.auth = context;
    next();
  };
}

export function requireAdmin(hooks: { onDenied?: (req: Request, res: Response) => void } = {}) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!readAuthContext(res)?.claims.isAdmin) {
      hooks.onDenied?.(req, res);
      respondError(res, new ForbiddenError('Admin access required'));
      return;
    }
    next();
  };
}
