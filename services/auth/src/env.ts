import { config as loadEnv } from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
const candidatePath = path.resolve(__dirname, '..', envFile);

if (fs.existsSync(candidatePath)) {
  loadEnv({ path: candidatePath });
} else {
  loadEnv();
}

const thirtyTwoByteBase64 = z.string().refine((value) => {
  try {
    return Buffer.from(value, 'base64').length === 32;
  } catch {
    return false;
  }
}, 'Must be a base64 encoded 256-bit key');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : value.toLowerCase() === 'true'));

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(4001),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().max(30_000).default(5_000),
    STORE_POOL_MAX: z.coerce.number().int().positive().default(10),
    JWT_ACCESS_SECRET: z.string().min(32, 'JWT_ACCESS_SECRET must be at least 32 characters'),
    JWT_CHALLENGE_SECRET: z
      .string()
      .min(32, 'JWT_CHALLENGE_SECRET must be at least 32 characters'),
    ACCESS_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .min(15 * 60)
      .max(30 * 60)
      .default(15 * 60),
    REFRESH_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 60 * 24 * 7),
    MFA_CHALLENGE_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .max(10 * 60)
      .default(5 * 60),
    EMAIL_CODE_TTL_MINUTES: z.coerce.number().int().min(5).max(10).default(5),
    EMAIL_VERIFICATION_TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(24),
    LOCKOUT_THRESHOLD: z.coerce.number().int().positive().default(5),
    LOCKOUT_WINDOW_MINUTES: z.coerce.number().int().positive().default(15),
    LOCKOUT_DURATION_MINUTES: z.coerce.number().int().positive().default(15),
    MFA_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(3),
    MFA_RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().positive().default(5),
    MFA_REMEMBER_DEVICE_DAYS: z.coerce.number().int().positive().default(7),
    MFA_REMEMBER_COOKIE_NAME: z.string().min(3).max(64).default('mg_mfa_remember'),
    MFA_ENCRYPTION_KEY: thirtyTwoByteBase64,
    MFA_TOTP_ISSUER: z.string().min(2).max(64).default('MFA Gateway'),
    COOKIE_DOMAIN: optionalString,
    COOKIE_SECURE: booleanFlag.default(true),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(200),
    RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().positive().default(1),
    APP_BASE_URL: z.string().url().default('http://localhost:3000'),
    MAIL_FROM: z.string().min(3).default('no-reply@localhost'),
    SMTP_HOST: optionalString,
    SMTP_PORT: z.coerce.number().int().positive().default(587),
    SMTP_USER: optionalString,
    SMTP_PASSWORD: optionalString,
    OIDC_ISSUER: optionalString,
    OIDC_AUDIENCE: optionalString,
    OIDC_JWKS_URL: optionalString,
    FEDERATED_PROVIDER: z.string().min(2).max(32).default('oidc'),
  })
  .superRefine((value, ctx) => {
    if (value.JWT_ACCESS_SECRET === value.JWT_CHALLENGE_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_CHALLENGE_SECRET'],
        message: 'JWT_CHALLENGE_SECRET must differ from JWT_ACCESS_SECRET',
      });
    }

    if (value.OIDC_ISSUER && !value.OIDC_AUDIENCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OIDC_AUDIENCE'],
        message: 'OIDC_AUDIENCE is required when OIDC_ISSUER is set',
      });
    }

    if (value.OIDC_ISSUER && !value.OIDC_JWKS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OIDC_JWKS_URL'],
        message: 'OIDC_JWKS_URL is required when OIDC_ISSUER is set',
      });
    }
  })
  .transform((value) => ({
    ...value,
    isProduction: value.NODE_ENV === 'production',
  }));

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
