import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';

import type { FastifyInstance } from 'fastify';
import { generateTotp } from '../src/lib/totp';
import { TEST_PASSWORD, advanceClock, buildTestEnv } from './helpers';
import { InMemoryAuthRepository } from './in-memory-auth-repository';
import { RecordingEmailService, StaticIdentityVerifier } from './stubs';

function cookieNames(header: string | string[] | undefined) {
  const cookies = Array.isArray(header) ? header : header ? [header] : [];
  return cookies.map((cookie) => cookie.split('=')[0]);
}

describe('Auth routes', () => {
  let app: FastifyInstance;
  let repository: InMemoryAuthRepository;
  let emailService: RecordingEmailService;
  let buildApp: (typeof import('../src/app'))['buildApp'];

  beforeAll(async () => {
    ({ buildApp } = await import('../src/app'));
  });

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-02T10:00:00.000Z'));
    repository = new InMemoryAuthRepository();
    emailService = new RecordingEmailService();
    app = await buildApp({
      env: buildTestEnv(),
      repository,
      emailService,
      identityVerifier: new StaticIdentityVerifier(),
      logger: false,
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    vi.useRealTimers();
  });

  async function registerAndVerify(email = 'casey@example.com') {
    const registered = await request(app.server)
      .post('/api/auth/register')
      .send({ email, password: TEST_PASSWORD, displayName: 'Casey' })
      .expect(201);

    await request(app.server)
      .post('/api/auth/email/verify')
      .send({ token: registered.body.data.debug.emailVerificationToken })
      .expect(200);

    const accountId: string = registered.body.data.account.id;
    return accountId;
  }

  async function loginForAccessToken(email = 'casey@example.com') {
    const response = await request(app.server)
      .post('/api/auth/login')
      .send({ email, password: TEST_PASSWORD })
      .expect(200);
    const accessToken: string = response.body.data.session.accessToken;
    return accessToken;
  }

  it('reports health from the store', async () => {
    await request(app.server).get('/health').expect(200, { status: 'ok' });

    repository.unavailable = true;
    await request(app.server).get('/health').expect(503, { status: 'unavailable' });
  });

  it('registers, verifies and signs in with session cookies', async () => {
    const accountId = await registerAndVerify();

    const login = await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: TEST_PASSWORD })
      .expect(200);

    expect(login.body.meta).toEqual({
      mfaRequired: false,
      usedRememberedDevice: false,
      backupCodesLow: false,
    });
    expect(login.body.data.account).toMatchObject({ id: accountId, emailVerified: true });
    expect(cookieNames(login.headers['set-cookie'])).toEqual(['mg_session', 'mg_refresh']);

    const me = await request(app.server)
      .get('/api/auth/me')
      .set('Authorization', `Bearer ${login.body.data.session.accessToken}`)
      .expect(200);
    expect(me.body.data.account.email).toBe('casey@example.com');
  });

  it('requires a valid access token for account routes', async () => {
    const response = await request(app.server).get('/api/auth/me').expect(401);
    expect(response.body).toEqual({
      error: { code: 'AUTH_UNAUTHORIZED', message: 'Authentication required.', details: null },
      correlationId: expect.any(String),
    });

    await request(app.server)
      .get('/api/auth/mfa/status')
      .set('Authorization', 'Bearer not-a-token')
      .expect(401);
  });

  it('hides unexpected failures behind a generic error', async () => {
    vi.spyOn(app.authService, 'refresh').mockRejectedValue(new Error('connection reset by peer'));

    const response = await request(app.server)
      .post('/api/auth/refresh')
      .send({ refreshToken: 'some-refresh-token' })
      .expect(500);

    expect(response.body.error).toEqual({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
    });
    expect(response.body.correlationId).toEqual(expect.any(String));
  });

  it('runs the totp enrolment and challenge flow', async () => {
    await registerAndVerify();
    const accessToken = await loginForAccessToken();
    const auth = { Authorization: `Bearer ${accessToken}` };

    const setup = await request(app.server)
      .post('/api/auth/mfa/totp/setup')
      .set(auth)
      .expect(201);
    const secret: string = setup.body.data.secret;
    expect(setup.body.data.backupCodes).toHaveLength(10);

    const confirmed = await request(app.server)
      .post('/api/auth/mfa/totp/confirm')
      .set(auth)
      .send({ code: generateTotp(secret) })
      .expect(200);
    expect(confirmed.body.data.account.totpEnabled).toBe(true);

    advanceClock(30_000);

    const challenge = await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: TEST_PASSWORD })
      .expect(200);
    expect(challenge.body.meta).toEqual({ mfaRequired: true });
    expect(challenge.body.data.availableMethods).toEqual(['totp', 'backup']);

    const verified = await request(app.server)
      .post('/api/auth/mfa/verify')
      .send({
        challengeToken: challenge.body.data.challengeToken,
        method: 'totp',
        code: generateTotp(secret),
        rememberDevice: true,
      })
      .expect(200);

    expect(verified.body.data.rememberedDevice.expiresAt).toBe('2026-03-09T10:00:30.000Z');
    expect(cookieNames(verified.headers['set-cookie'])).toEqual([
      'mg_session',
      'mg_refresh',
      'mg_mfa_remember',
    ]);

    const remembered = await request(app.server)
      .post('/api/auth/login')
      .send({
        email: 'casey@example.com',
        password: TEST_PASSWORD,
        rememberedDeviceToken: verified.body.data.rememberedDevice.token,
      })
      .expect(200);
    expect(remembered.body.meta.usedRememberedDevice).toBe(true);

    await request(app.server)
      .post('/api/auth/logout')
      .set('Cookie', [
        `mg_refresh=${remembered.body.data.session.refreshToken}`,
        `mg_mfa_remember=${verified.body.data.rememberedDevice.token}`,
      ])
      .send({})
      .expect(204);

    const afterLogout = await request(app.server)
      .post('/api/auth/login')
      .send({
        email: 'casey@example.com',
        password: TEST_PASSWORD,
        rememberedDeviceToken: verified.body.data.rememberedDevice.token,
      })
      .expect(200);
    expect(afterLogout.body.meta).toEqual({ mfaRequired: true });
  });

  it('rejects a wrong code with a generic error', async () => {
    await registerAndVerify();
    const accessToken = await loginForAccessToken();

    await request(app.server)
      .post('/api/auth/mfa/totp/setup')
      .set('Authorization', `Bearer ${accessToken}`)
      .expect(201);

    const response = await request(app.server)
      .post('/api/auth/mfa/totp/confirm')
      .set('Authorization', `Bearer ${accessToken}`)
      .send({ code: 'abcdef' })
      .expect(401);

    expect(response.body.error).toEqual({
      code: 'AUTH_INVALID_CODE',
      message: 'The verification code is invalid.',
      details: null,
    });
  });

  it('rotates refresh tokens and rejects the old one', async () => {
    await registerAndVerify();
    const login = await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: TEST_PASSWORD })
      .expect(200);
    const refreshToken: string = login.body.data.session.refreshToken;

    const refreshed = await request(app.server)
      .post('/api/auth/refresh')
      .send({ refreshToken })
      .expect(200);
    expect(refreshed.body.data.session.refreshToken).not.toBe(refreshToken);

    const replay = await request(app.server)
      .post('/api/auth/refresh')
      .send({ refreshToken })
      .expect(401);
    expect(replay.body.error.code).toBe('AUTH_REFRESH_TOKEN_INVALID');

    await request(app.server)
      .post('/api/auth/refresh')
      .send({ refreshToken: refreshed.body.data.session.refreshToken })
      .expect(401);
  });

  it('logs out with the refresh cookie', async () => {
    await registerAndVerify();
    const login = await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: TEST_PASSWORD })
      .expect(200);

    await request(app.server)
      .post('/api/auth/logout')
      .set('Cookie', `mg_refresh=${login.body.data.session.refreshToken}`)
      .send({})
      .expect(204);

    await request(app.server)
      .post('/api/auth/refresh')
      .send({ refreshToken: login.body.data.session.refreshToken })
      .expect(401);
  });

  it('deletes the signed-in account', async () => {
    await registerAndVerify();
    const accessToken = await loginForAccessToken();

    await request(app.server)
      .delete('/api/auth/account')
      .set('Authorization', `Bearer ${accessToken}`)
      .send({ currentPassword: 'Wr0ngPassword!!' })
      .expect(401);

    const deleted = await request(app.server)
      .delete('/api/auth/account')
      .set('Authorization', `Bearer ${accessToken}`)
      .send({ currentPassword: TEST_PASSWORD })
      .expect(204);
    expect(cookieNames(deleted.headers['set-cookie'])).toEqual([
      'mg_session',
      'mg_refresh',
      'mg_mfa_remember',
    ]);

    const me = await request(app.server)
      .get('/api/auth/me')
      .set('Authorization', `Bearer ${accessToken}`)
      .expect(401);
    expect(me.body.error.code).toBe('AUTH_UNAUTHORIZED');

    await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: TEST_PASSWORD })
      .expect(401);
  });

  it('reports a lockout with retry-after', async () => {
    await registerAndVerify();

    for (let i = 0; i < 5; i += 1) {
      await request(app.server)
        .post('/api/auth/login')
        .send({ email: 'casey@example.com', password: 'Wr0ngPassword!!' })
        .expect(401);
    }

    const response = await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: TEST_PASSWORD })
      .expect(423);

    expect(response.headers['retry-after']).toBe('900');
    expect(response.body.error.code).toBe('AUTH_ACCOUNT_LOCKED');
  });

  it('changes the password and clears the session', async () => {
    await registerAndVerify();
    const accessToken = await loginForAccessToken();

    await request(app.server)
      .post('/api/auth/password/change')
      .set('Authorization', `Bearer ${accessToken}`)
      .send({ currentPassword: TEST_PASSWORD, newPassword: 'An0therSecret!!' })
      .expect(204);

    await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: 'An0therSecret!!' })
      .expect(200);
    expect(emailService.noticeEvents()).toEqual(['password_changed']);
  });

  it('enables email codes and resends them for a challenge', async () => {
    await registerAndVerify();
    const accessToken = await loginForAccessToken();

    await request(app.server)
      .post('/api/auth/mfa/email/setup')
      .set('Authorization', `Bearer ${accessToken}`)
      .expect(200);

    const challenge = await request(app.server)
      .post('/api/auth/login')
      .send({ email: 'casey@example.com', password: TEST_PASSWORD })
      .expect(200);
    expect(challenge.body.data.method).toBe('email');

    await request(app.server)
      .post('/api/auth/mfa/resend')
      .send({ challengeToken: challenge.body.data.challengeToken })
      .expect(202);
    expect(emailService.mfaCodes).toHaveLength(2);

    const verified = await request(app.server)
      .post('/api/auth/mfa/verify')
      .send({
        challengeToken: challenge.body.data.challengeToken,
        method: 'email',
        code: emailService.lastMfaCode(),
      })
      .expect(200);
    expect(verified.body.data.account.emailMfaEnabled).toBe(true);
  });
});
