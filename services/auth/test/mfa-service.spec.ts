import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { generateTotp } from '../src/lib/totp';
import {
  advanceClock,
  createAuthServiceForTest,
  createVerifiedAccount,
  type TestContext,
} from './helpers';
import { enrollTotp, wrongCode } from './mfa-fixtures';

describe('MfaService', () => {
  let context: TestContext;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-02T10:00:00.000Z'));
    context = createAuthServiceForTest();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports a fresh account as having no second factor', async () => {
    const account = await createVerifiedAccount(context);

    expect(await context.mfaService.getStatus(account.id)).toEqual({
      mfaRequired: false,
      totpEnabled: false,
      totpPending: false,
      emailMfaEnabled: false,
      emailVerified: true,
      backupCodesRemaining: 0,
      preferredMethod: null,
    });
  });

  describe('totp', () => {
    it('stays pending until a valid code confirms it', async () => {
      const account = await createVerifiedAccount(context);
      const setup = await context.mfaService.setupTotp(account.id);

      expect(setup.provisioningUri).toContain('otpauth://totp/MFA%20Gateway%20Test%3Acasey%40example.com');
      expect(setup.backupCodes).toHaveLength(10);
      expect(await context.mfaService.getStatus(account.id)).toMatchObject({
        mfaRequired: false,
        totpPending: true,
        backupCodesRemaining: 10,
      });

      await expect(
        context.mfaService.confirmTotp(account.id, wrongCode(setup.secret)),
      ).rejects.toMatchObject({ status: 401, code: 'AUTH_INVALID_CODE' });

      const confirmed = await context.mfaService.confirmTotp(account.id, generateTotp(setup.secret));
      expect(confirmed).toMatchObject({ totpEnabled: true, mfaEnabled: true });
      expect(await context.mfaService.getStatus(account.id)).toMatchObject({
        mfaRequired: true,
        totpEnabled: true,
        totpPending: false,
        preferredMethod: 'totp',
      });

      await expect(context.mfaService.setupTotp(account.id)).rejects.toMatchObject({
        status: 409,
        code: 'AUTH_TOTP_ALREADY_ENABLED',
      });
    });

    it('requires setup before confirmation', async () => {
      const account = await createVerifiedAccount(context);

      await expect(context.mfaService.confirmTotp(account.id, '123456')).rejects.toMatchObject({
        status: 400,
        code: 'AUTH_TOTP_NOT_INITIALIZED',
      });
    });

    it('never accepts the same time step twice', async () => {
      const account = await createVerifiedAccount(context);
      const setup = await context.mfaService.setupTotp(account.id);
      const code = generateTotp(setup.secret);
      await context.mfaService.confirmTotp(account.id, code);

      await expect(context.mfaService.disableTotp(account.id, code)).rejects.toMatchObject({
        status: 401,
        code: 'AUTH_INVALID_CODE',
      });

      advanceClock(30_000);
      const disabled = await context.mfaService.disableTotp(account.id, generateTotp(setup.secret));

      expect(disabled).toMatchObject({ totpEnabled: false, mfaEnabled: false });
      expect((await context.mfaService.getStatus(account.id)).backupCodesRemaining).toBe(0);
    });
  });

  describe('email codes', () => {
    it('requires a verified address', async () => {
      const registered = await context.service.register({
        email: 'unverified@example.com',
        password: 'Sup3rSecurePass!',
      });

      await expect(context.mfaService.setupEmailMfa(registered.account.id)).rejects.toMatchObject({
        status: 400,
        code: 'AUTH_EMAIL_NOT_VERIFIED',
      });
      await expect(context.mfaService.sendEmailCode(registered.account.id)).rejects.toMatchObject({
        status: 400,
        code: 'AUTH_EMAIL_MFA_DISABLED',
      });
    });

    it('sends a code that verifies exactly once', async () => {
      const account = await createVerifiedAccount(context);
      const enabled = await context.mfaService.setupEmailMfa(account.id);
      expect(enabled).toMatchObject({ emailMfaEnabled: true, mfaEnabled: true });

      const dispatch = await context.mfaService.sendEmailCode(account.id);
      expect(dispatch).toEqual({
        expiresAt: new Date('2026-03-02T10:05:00.000Z'),
        delivered: true,
      });
      expect(context.emailService.mfaCodes[0].to.email).toBe('casey@example.com');

      const code = context.emailService.lastMfaCode() ?? '';
      expect(await context.mfaService.verifyEmailCode(account.id, code)).toEqual({
        method: 'email',
        backupCodesRemaining: null,
        backupCodesLow: false,
      });
      await expect(context.mfaService.verifyEmailCode(account.id, code)).rejects.toMatchObject({
        status: 401,
        code: 'AUTH_INVALID_CODE',
      });
    });

    it('reports undelivered codes', async () => {
      const account = await createVerifiedAccount(context);
      await context.mfaService.setupEmailMfa(account.id);
      context.emailService.deliver = false;

      expect((await context.mfaService.sendEmailCode(account.id)).delivered).toBe(false);
    });

    it('rate limits after three failures and recovers after the window', async () => {
      const account = await createVerifiedAccount(context);
      await context.mfaService.setupEmailMfa(account.id);
      await context.mfaService.sendEmailCode(account.id);
      const code = context.emailService.lastMfaCode() ?? '';
      const wrong = code === '000000' ? '111111' : '000000';

      for (let i = 0; i < 3; i += 1) {
        await expect(context.mfaService.verifyEmailCode(account.id, wrong)).rejects.toMatchObject({
          status: 401,
        });
      }

      await expect(context.mfaService.verifyEmailCode(account.id, code)).rejects.toMatchObject({
        status: 429,
        code: 'AUTH_MFA_RATE_LIMITED',
        retryAfterSeconds: 300,
      });

      advanceClock(5 * 60_000 + 1_000);
      await context.mfaService.sendEmailCode(account.id);
      const fresh = context.emailService.lastMfaCode() ?? '';

      expect((await context.mfaService.verifyEmailCode(account.id, fresh)).method).toBe('email');
    });

    it('can be turned off again', async () => {
      const account = await createVerifiedAccount(context);
      await context.mfaService.setupEmailMfa(account.id);

      expect(await context.mfaService.disableEmailMfa(account.id)).toMatchObject({
        emailMfaEnabled: false,
        mfaEnabled: false,
      });
    });
  });

  describe('backup codes', () => {
    it('counts down and warns when two or fewer remain', async () => {
      const account = await createVerifiedAccount(context);
      const { backupCodes } = await enrollTotp(context, account.id);

      expect(await context.mfaService.verifyBackupCode(account.id, backupCodes[0])).toEqual({
        method: 'backup',
        backupCodesRemaining: 9,
        backupCodesLow: false,
      });
      await expect(
        context.mfaService.verifyBackupCode(account.id, backupCodes[0]),
      ).rejects.toMatchObject({ status: 401, code: 'AUTH_INVALID_CODE' });

      for (const code of backupCodes.slice(1, 7)) {
        await context.mfaService.verifyBackupCode(account.id, code);
      }
      expect(context.emailService.noticeEvents()).toEqual([]);

      const low = await context.mfaService.verifyBackupCode(account.id, backupCodes[7]);
      expect(low).toEqual({ method: 'backup', backupCodesRemaining: 2, backupCodesLow: true });
      expect(context.emailService.securityNotices).toHaveLength(1);
      expect(context.emailService.securityNotices[0]).toMatchObject({
        event: 'backup_codes_low',
        detail: { remaining: 2 },
      });
    });

    it('regenerates the set with a current totp code', async () => {
      const account = await createVerifiedAccount(context);
      const { secret, backupCodes } = await enrollTotp(context, account.id);

      const replacement = await context.mfaService.regenerateBackupCodes(
        account.id,
        generateTotp(secret),
      );

      expect(replacement).toHaveLength(10);
      expect((await context.mfaService.getStatus(account.id)).backupCodesRemaining).toBe(10);

      const retired = backupCodes.find((code) => !replacement.includes(code)) ?? backupCodes[0];
      await expect(context.mfaService.verifyBackupCode(account.id, retired)).rejects.toMatchObject({
        status: 401,
      });
    });

    it('is only available alongside totp', async () => {
      const account = await createVerifiedAccount(context);

      await expect(
        context.mfaService.regenerateBackupCodes(account.id, '123456'),
      ).rejects.toMatchObject({ status: 400, code: 'AUTH_TOTP_NOT_ENABLED' });
    });
  });

  it('refuses inactive accounts', async () => {
    const account = await createVerifiedAccount(context);
    context.repository.setAccountStatus(account.id, 'suspended');

    await expect(context.mfaService.getStatus(account.id)).rejects.toMatchObject({
      status: 401,
      code: 'AUTH_ACCOUNT_NOT_FOUND',
    });
  });
});
