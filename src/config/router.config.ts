import { registerAs } from '@nestjs/config';
import { IANAZone } from 'luxon';
import { z } from 'zod';

/** Hard policy, deliberately not configurable. */
export const MAX_LOOKBACK_DAYS = 40;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const flag = (fallback: boolean) =>
  optionalString.transform((value) =>
    value === undefined ? fallback : TRUTHY.has(value.trim().toLowerCase()),
  );

export const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default('gpt-4o-mini')),
  DEFAULT_ACCOUNT_EMAIL: z.preprocess(blankToUndefined, z.string().email().optional()),
  LOCAL_TZ: z.preprocess(
    blankToUndefined,
    z
      .string()
      .default('Europe/London')
      .refine((zone) => IANAZone.isValidZone(zone), { message: 'LOCAL_TZ must be an IANA zone name' }),
  ),
  DRY_RUN: flag(false),
  DRAFT_EMAILS: flag(true),
  DEFAULT_SIGNATURE: z.preprocess(blankToUndefined, z.string().default('')),
  SCHEDULING_LINK_MAX_COUNT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(1)),
  CALENDLY_TOKEN: optionalString,
  CALENDLY_EVENT_TYPE_URI: optionalString,
  GOOGLE_OAUTH_CLIENT_ID: optionalString,
  GOOGLE_OAUTH_CLIENT_SECRET: optionalString,
  GOOGLE_OAUTH_REDIRECT_URL: optionalString,
  GOOGLE_TOKENS_DIR: z.preprocess(blankToUndefined, z.string().default('tokens')),
  DOWNLOAD_DIR: z.preprocess(blankToUndefined, z.string().default('downloads')),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(3000)),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n${issues.join('\n')}`);
  }
  return result.data;
}

export interface RouterSettings {
  defaultAccountEmail?: string;
  timezone: string;
  dryRun: boolean;
  draftEmails: boolean;
  defaultSignature: string;
  schedulingLinkMaxCount: number;
}

export function toRouterSettings(env: Env): RouterSettings {
  return {
    defaultAccountEmail: env.DEFAULT_ACCOUNT_EMAIL,
    timezone: env.LOCAL_TZ,
    dryRun: env.DRY_RUN,
    draftEmails: env.DRAFT_EMAILS,
    defaultSignature: env.DEFAULT_SIGNATURE,
    schedulingLinkMaxCount: env.SCHEDULING_LINK_MAX_COUNT,
  };
}

export const routerConfig = registerAs('router', (): RouterSettings => toRouterSettings(validateEnv(process.env)));
