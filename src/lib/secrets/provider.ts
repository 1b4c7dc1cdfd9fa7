/**
 * シークレットストア
 *
 * @description ストレージの認証情報を名前で1回だけ取得する。
 * - env: 名前を大文字スネークケースの環境変数として読む（GitHub Actions secrets）
 * - aws-secrets-manager: AWS Secrets Manager（キャッシュ付き）
 */

import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import type { AppConfig } from '../config';
import { SecretRetrievalError } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ module: 'secrets' });

export interface SecretProvider {
  /**
   * @throws {SecretRetrievalError} 取得できない・値が空
   */
  getSecret(name: string): Promise<string>;
  close(): Promise<void>;
}

/**
 * シークレット名 → 環境変数名
 *
 * @example secretNameToEnvKey('supabase-service-role-key') // 'SUPABASE_SERVICE_ROLE_KEY'
 */
export function secretNameToEnvKey(name: string): string {
  return name.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase();
}

/**
 * 環境変数バックエンド
 */
export class EnvSecretProvider implements SecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getSecret(name: string): Promise<string> {
    const key = secretNameToEnvKey(name);
    const value = this.env[key];
    if (!value) {
      throw new SecretRetrievalError(`Secret ${name} is not set (env.${key})`, name);
    }
    return value;
  }

  async close(): Promise<void> {}
}

/**
 * AWS Secrets Manager バックエンド
 */
export class AwsSecretsManagerProvider implements SecretProvider {
  private readonly client: SecretsManagerClient;
  private readonly cache = new Map<string, string>();

  constructor(options: { region: string; client?: SecretsManagerClient }) {
    this.client = options.client ?? new SecretsManagerClient({ region: options.region });
  }

  async getSecret(name: string): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      logger.debug('Using cached secret', { secretName: name });
      return cached;
    }

    logger.info('Fetching secret from Secrets Manager', { secretName: name });

    let secretString: string | undefined;
    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: name }));
      secretString = response.SecretString;
    } catch (error) {
      logger.error('Failed to retrieve secret', { secretName: name, error });
      throw new SecretRetrievalError(`Failed to retrieve secret ${name}`, name, { cause: error });
    }

    if (!secretString) {
      throw new SecretRetrievalError(`Secret ${name} has no string value`, name);
    }

    this.cache.set(name, secretString);
    return secretString;
  }

  async close(): Promise<void> {
    this.cache.clear();
    this.client.destroy();
  }
}

/**
 * 設定に応じたシークレットプロバイダーを作成
 */
export function createSecretProvider(config: Pick<AppConfig, 'secretBackend' | 'awsRegion'>): SecretProvider {
  switch (config.secretBackend) {
    case 'aws-secrets-manager':
      return new AwsSecretsManagerProvider({ region: config.awsRegion });
    case 'env':
      return new EnvSecretProvider();
  }
}
