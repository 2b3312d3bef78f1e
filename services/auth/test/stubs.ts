import type {
  EmailDelivery,
  EmailMfaCodeMessage,
  EmailService,
  SecurityNoticeMessage,
  VerificationEmailMessage,
} from '../src/services/email-service';
import type { IdentityVerifier, VerifiedIdentity } from '../src/services/identity-verifier';
import { unauthorized } from '../src/errors';

export class RecordingEmailService implements EmailService {
  readonly mfaCodes: EmailMfaCodeMessage[] = [];

  readonly verificationEmails: VerificationEmailMessage[] = [];

  readonly securityNotices: SecurityNoticeMessage[] = [];

  /** When false every send reports `sent: false`. */
  deliver = true;

  async sendEmailMfaCode(message: EmailMfaCodeMessage) {
    this.mfaCodes.push(message);
    return this.delivery();
  }

  async sendVerificationEmail(message: VerificationEmailMessage) {
    this.verificationEmails.push(message);
    return this.delivery();
  }

  async sendSecurityNotice(message: SecurityNoticeMessage) {
    this.securityNotices.push(message);
    return this.delivery();
  }

  lastMfaCode() {
    return this.mfaCodes.at(-1)?.code ?? null;
  }

  lastVerificationToken() {
    return this.verificationEmails.at(-1)?.verificationToken ?? null;
  }

  noticeEvents() {
    return this.securityNotices.map((notice) => notice.event);
  }

  private delivery(): EmailDelivery {
    return this.deliver
      ? { sent: true, messageId: `test-${this.mfaCodes.length + this.securityNotices.length}` }
      : { sent: false, messageId: null };
  }
}

/** Accepts tokens registered with `register`; anything else is rejected. */
export class StaticIdentityVerifier implements IdentityVerifier {
  private readonly identities = new Map<string, VerifiedIdentity>();

  register(token: string, identity: Omit<VerifiedIdentity, 'provider'>, provider = 'oidc') {
    this.identities.set(token, { ...identity, provider });
  }

  async verify(identityToken: string): Promise<VerifiedIdentity> {
    const identity = this.identities.get(identityToken);
    if (!identity) {
      throw unauthorized('AUTH_FEDERATED_TOKEN_INVALID', 'Identity token is invalid.');
    }
    return identity;
  }
}
