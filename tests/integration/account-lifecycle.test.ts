/**
 * End-to-end account lifecycle
 *
 * Loads a configuration file with key files on disk, builds the application
 * from it and walks an account from pre-registration to token refresh over
 * HTTP.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import { ConfigManager, loadConfiguredSigningKeys } from '../../src/config/manager.js';
import { createApplication, type Application } from '../../src/application.js';
import { InMemoryAuditStorage } from '../../src/core/audit-service.js';
import { InMemoryAccountStore } from '../../src/store/memory-account-store.js';
import {
  generateTestKeyMaterial,
  RecordingNotifier,
  TestClock,
} from '../../src/testing/index.js';

describe('Account lifecycle (integration)', () => {
  let dir: string;
  let application: Application;
  const notifier = new RecordingNotifier();
  const clock = new TestClock(new Date('2026-05-01T09:00:00.000Z'));
  const auditStorage = new InMemoryAuditStorage();

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    dir = await mkdtemp(join(tmpdir(), 'lifecycle-'));
    const material = await generateTestKeyMaterial('ES256');
    await writeFile(join(dir, 'private.pem'), material.privateKeyPem);
    await writeFile(join(dir, 'public.pem'), material.publicKeyPem);

    const configPath = join(dir, 'config.json');
    await writeFile(
      configPath,
      JSON.stringify({
        server: { secureCookies: false },
        credentials: {
          issuer: 'accounts.test',
          accessTtlSeconds: 300,
          refreshTtlSeconds: 3600,
          keys: {
            algorithm: 'ES256',
            privateKeyPath: join(dir, 'private.pem'),
            publicKeyPath: join(dir, 'public.pem'),
          },
        },
        accounts: { activationWindowSeconds: 120 },
        audit: { enabled: true },
      })
    );

    const config = await new ConfigManager({ secretsDir: join(dir, 'secrets'), env: {} }).loadConfig(
      configPath
    );
    const keys = await loadConfiguredSigningKeys(config.credentials.keys);
    application = createApplication(config, keys, {
      store: new InMemoryAccountStore(),
      notifier,
      clock,
      auditStorage,
    });
  });

  afterAll(async () => {
    await application.close();
    await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should take an account from pre-registration to refresh', async () => {
    const { app, credentials } = application;
    const email = 'lifecycle@x.com';

    // First secret is superseded by a second pre-registration
    await request(app).post('/api/auth/register/initial').send({ email, password: 'first1' }).expect(200);
    clock.advance({ minutes: 1 });
    await request(app).post('/api/auth/register/initial').send({ email, password: 'second2' }).expect(200);
    expect(notifier.sent.map((m) => m.email)).toEqual([email, email]);

    clock.advance({ minutes: 1 });
    await request(app)
      .post('/api/auth/register/complete')
      .send({ email, token: notifier.lastSecretFor(email) })
      .expect(200, { message: 'activate ok' });

    // Only the password from the surviving pre-registration works
    await request(app).post('/api/auth/login').send({ email, password: 'first1' }).expect(401);
    const loginRes = await request(app)
      .post('/api/auth/login')
      .send({ email, password: 'second2' })
      .expect(200);

    const access = credentials.decode(loginRes.body.access_token);
    expect(access).toEqual({
      iss: 'accounts.test',
      sub: 'access-token',
      iat: 1777626120,
      exp: 1777626420,
      user_id: 2,
    });

    const setCookie = loginRes.headers['set-cookie'];
    const cookies: string[] = Array.isArray(setCookie) ? setCookie : [];
    const refreshCookie = cookies.find((c) => c.startsWith('refresh-token=')) ?? '';
    expect(refreshCookie).toContain('Max-Age=3600');
    expect(refreshCookie).not.toContain('Secure');
    const refreshToken = refreshCookie.split(';')[0].slice('refresh-token='.length);

    // Access credential lapses, refresh credential still renews it
    clock.advance({ minutes: 10 });
    await request(app)
      .get('/api/restricted/user/me')
      .set('Authorization', `Bearer ${loginRes.body.access_token}`)
      .expect(401);

    const refreshRes = await request(app)
      .get('/api/auth/refresh')
      .set('Cookie', `refresh-token=${refreshToken}`)
      .expect(200);

    const meRes = await request(app)
      .get('/api/restricted/user/me')
      .set('Authorization', `Bearer ${refreshRes.body.access_token}`)
      .expect(200);
    expect(meRes.body).toEqual({
      id: 2,
      email,
      created_at: '2026-05-01T09:01:00.000Z',
      updated_at: '2026-05-01T09:02:00.000Z',
    });

    // Past the refresh TTL nothing renews
    clock.advance({ hours: 1 });
    await request(app)
      .get('/api/auth/refresh')
      .set('Cookie', `refresh-token=${refreshToken}`)
      .expect(401, { error: 'invalid_credentials', error_description: 'Invalid credentials' });

    expect(
      auditStorage.getEntries().map((entry) => `${entry.action}:${entry.success ? 'ok' : 'fail'}`)
    ).toEqual([
      'preRegister:ok',
      'preRegister:ok',
      'activate:ok',
      'login:fail',
      'login:ok',
      'refresh:ok',
      'refresh:fail',
    ]);
  });
});
