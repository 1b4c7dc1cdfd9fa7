/**
 * 環境変数設定
 *
 * @description 起動時に一度だけ読み込み、各ステージには AppConfig として渡す
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_INE_BASE_URL } from './ine/client';

export const SECRET_BACKENDS = ['env', 'aws-secrets-manager'] as const;
export type SecretBackend = (typeof SECRET_BACKENDS)[number];

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const EnvSchema = z.object({
  INE_API_BASE_URL: z.string().url().default(DEFAULT_INE_BASE_URL),
  INE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  JOB_DEADLINE_MS: z.coerce.number().int().positive().default(600000),
  RUN_TIME_ZONE: z.string().refine(isValidTimeZone, 'Invalid IANA time zone').default('Europe/Lisbon'),
  SUPABASE_URL: z.string().url(),
  STORAGE_BUCKET: z.string().min(1).default('ine-api'),
  SECRET_BACKEND: z.enum(SECRET_BACKENDS).default('env'),
  STORAGE_SECRET_NAME: z.string().min(1).default('supabase-service-role-key'),
  AWS_REGION: z.string().min(1).default('eu-west-1'),
});

export interface AppConfig {
  ineBaseUrl: string;
  requestTimeoutMs: number;
  jobDeadlineMs: number;
  timeZone: string;
  supabaseUrl: string;
  storageBucket: string;
  secretBackend: SecretBackend;
  storageSecretName: string;
  awsRegion: string;
}

/**
 * 環境変数から設定を読み込む
 *
 * 空文字の変数は未設定として扱う（`.env` の `KEY=` 行）
 *
 * @throws {ConfigError} 必須変数の欠落・不正値
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  return {
    ineBaseUrl: e.INE_API_BASE_URL,
    requestTimeoutMs: e.INE_REQUEST_TIMEOUT_MS,
    jobDeadlineMs: e.JOB_DEADLINE_MS,
    timeZone: e.RUN_TIME_ZONE,
    supabaseUrl: e.SUPABASE_URL,
    storageBucket: e.STORAGE_BUCKET,
    secretBackend: e.SECRET_BACKEND,
    storageSecretName: e.STORAGE_SECRET_NAME,
    awsRegion: e.AWS_REGION,
  };
}
