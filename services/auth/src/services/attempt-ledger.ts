import type { Account, AttemptMethod, RequestOrigin } from '../domain/models';
import type { AuthRepository, LoginFailureState } from '../repositories/auth-repository';

const MINUTE_MS = 60_000;

export interface AttemptLedgerPolicy {
  lockoutThreshold: number;
  lockoutWindowMinutes: number;
  lockoutDurationMinutes: number;
  rateLimitMax: number;
  rateLimitWindowMinutes: number;
}

export interface LockStatus {
  locked: boolean;
  retryAfterSeconds: number;
}

export type RateLimitDecision =
  | { limited: false; remaining: number }
  | { limited: true; retryAfterSeconds: number };

export type LimitedAttempt<T> =
  | { limited: true; retryAfterSeconds: number }
  | { limited: false; outcome: T };

export interface PasswordFailureOutcome extends LoginFailureState {
  shouldLock: boolean;
}

function secondsUntil(target: Date, now: Date) {
  return Math.max(1, Math.ceil((target.getTime() - now.getTime()) / 1000));
}

/**
 * Every decision here is read back from the store, so several service
 * instances sharing one database agree on lockouts and rate limits.
 */
export class AttemptLedger {
  constructor(
    private readonly repository: AuthRepository,
    private readonly policy: AttemptLedgerPolicy,
  ) {}

  record(
    accountId: string,
    method: AttemptMethod,
    success: boolean,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ) {
    return this.repository.recordAttempt({
      accountId,
      method,
      success,
      ipAddress: origin.ipAddress ?? null,
      userAgent: origin.userAgent ?? null,
      createdAt: now,
    });
  }

  lockStatus(account: Pick<Account, 'lockedUntil'>, now: Date = new Date()): LockStatus {
    if (!account.lockedUntil || account.lockedUntil.getTime() <= now.getTime()) {
      return { locked: false, retryAfterSeconds: 0 };
    }
    return { locked: true, retryAfterSeconds: secondsUntil(account.lockedUntil, now) };
  }

  isLocked(account: Pick<Account, 'lockedUntil'>, now: Date = new Date()) {
    return this.lockStatus(account, now).locked;
  }

  async registerPasswordFailure(
    accountId: string,
    now: Date = new Date(),
  ): Promise<PasswordFailureOutcome> {
    const state = await this.repository.registerLoginFailure({
      accountId,
      now,
      windowStart: new Date(now.getTime() - this.policy.lockoutWindowMinutes * MINUTE_MS),
      threshold: this.policy.lockoutThreshold,
      lockUntil: new Date(now.getTime() + this.policy.lockoutDurationMinutes * MINUTE_MS),
    });

    return { ...state, shouldLock: state.lockTriggered };
  }

  resetPasswordFailures(accountId: string) {
    return this.repository.resetLoginFailures(accountId);
  }

  /**
   * Checks the rate limit, runs one attempt and records its outcome while the
   * store lock for `method` is held. Concurrent attempts queue behind it, so
   * they never all pass the check on the same count.
   */
  evaluate<T extends { ok: boolean }>(
    accountId: string,
    method: AttemptMethod,
    attempt: () => Promise<T>,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ): Promise<LimitedAttempt<T>> {
    return this.repository.withAttemptLock(
      accountId,
      method,
      async (): Promise<LimitedAttempt<T>> => {
        const decision = await this.checkRateLimit(accountId, method, now);
        if (decision.limited) {
          return decision;
        }

        const outcome = await attempt();
        await this.record(accountId, method, outcome.ok, origin, now);
        return { limited: false, outcome };
      },
    );
  }

  async checkRateLimit(
    accountId: string,
    method: AttemptMethod,
    now: Date = new Date(),
  ): Promise<RateLimitDecision> {
    const windowMs = this.policy.rateLimitWindowMinutes * MINUTE_MS;
    const summary = await this.repository.summarizeFailedAttempts(
      accountId,
      method,
      new Date(now.getTime() - windowMs),
    );

    if (summary.count < this.policy.rateLimitMax) {
      return { limited: false, remaining: this.policy.rateLimitMax - summary.count };
    }

    const oldest = summary.oldest ?? now;
    return {
      limited: true,
      retryAfterSeconds: secondsUntil(new Date(oldest.getTime() + windowMs), now),
    };
  }
}
