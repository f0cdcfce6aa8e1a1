import path from 'path';
import { DEFAULT_ADMIN_PASSWORD, DEFAULT_SIGNING_SECRET, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults and warns about insecure credentials', () => {
    const { config, warnings } = loadConfig({});

    expect(config).toEqual({
      serveDir: path.resolve('./data'),
      port: 8080,
      signingSecret: DEFAULT_SIGNING_SECRET,
      adminPassword: DEFAULT_ADMIN_PASSWORD,
      dbPath: path.resolve('filebrowser.db'),
      auditDir: path.resolve('.treeserve-audit'),
      auditRetentionDays: 90,
      tokenTtlSeconds: 86400,
      loginRateLimitMax: 20,
      staticDir: path.resolve('./public')
    });
    expect(warnings).toEqual([
      'using default token signing secret, set JWT_SECRET in production',
      "using default admin password 'admin123', set ADMIN_PASSWORD"
    ]);
  });

  it('reads values from the environment', () => {
    const { config, warnings } = loadConfig({
      SERVE_DIR: '/srv/files',
      PORT: '9090',
      JWT_SECRET: 'test-secret',
      ADMIN_PASSWORD: 'test-admin-pass',
      DB_PATH: ':memory:',
      TOKEN_TTL_SECONDS: '3600',
      LOGIN_RATE_LIMIT_MAX: '5'
    });

    expect(warnings).toEqual([]);
    expect(config.serveDir).toBe(path.resolve('/srv/files'));
    expect(config.port).toBe(9090);
    expect(config.signingSecret).toBe('test-secret');
    expect(config.adminPassword).toBe('test-admin-pass');
    expect(config.dbPath).toBe(':memory:');
    expect(config.tokenTtlSeconds).toBe(3600);
    expect(config.loginRateLimitMax).toBe(5);
  });

  it('treats blank values as unset', () => {
    const { config } = loadConfig({ JWT_SECRET: '   ', SERVE_DIR: '' });

    expect(config.signingSecret).toBe(DEFAULT_SIGNING_SECRET);
    expect(config.serveDir).toBe(path.resolve('./data'));
  });

  it('rejects malformed numbers with a warning', () => {
    const { config, warnings } = loadConfig({
      JWT_SECRET: 'test-secret',
      ADMIN_PASSWORD: 'test-admin-pass',
      PORT: '80abc',
      TOKEN_TTL_SECONDS: '-5'
    });

    expect(config.port).toBe(8080);
    expect(config.tokenTtlSeconds).toBe(86400);
    expect(warnings).toEqual([
      'invalid PORT=80abc, fallback to 8080',
      'invalid TOKEN_TTL_SECONDS=-5, fallback to 86400'
    ]);
  });

  it('rejects ports beyond the valid range', () => {
    const { config, warnings } = loadConfig({
      JWT_SECRET: 'test-secret',
      ADMIN_PASSWORD: 'test-admin-pass',
      PORT: '70000'
    });

    expect(config.port).toBe(8080);
    expect(warnings).toEqual(['invalid PORT=70000, fallback to 8080']);
  });
});
