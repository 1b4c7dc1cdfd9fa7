/**
 * ジョブ実行コンテキスト
 *
 * @description プロセス起動時に1回だけ構築する（シークレット → ストレージクライアント → INE クライアント）。
 * 終了時に close() で接続を解放する。
 */

import type { AppConfig } from '../config';
import { createIneClient, type IneClient } from '../ine/client';
import { INDICATOR_0008074, type IndicatorDefinition } from '../ine/indicator-config';
import { createSecretProvider, type SecretProvider } from '../secrets/provider';
import { SupabaseObjectStore, type ObjectStore } from '../storage/object-store';
import { createStorageClient } from '../supabase/admin';
import type { FetchLike } from '../utils/http';
import { createLogger, type LogContext } from '../utils/logger';

const logger = createLogger({ module: 'job-context' });

export interface JobContext {
  config: AppConfig;
  indicator: IndicatorDefinition;
  ineClient: IneClient;
  store: ObjectStore;
  close(): Promise<void>;
}

/** テスト・ローカル実行用の差し替えポイント */
export interface JobContextDeps {
  secretProvider?: SecretProvider;
  /** 認証情報からストアを作る（省略時は Supabase Storage） */
  createStore?: (config: AppConfig, credential: string) => {
    store: ObjectStore;
    close?: () => Promise<void>;
  };
  fetchImpl?: FetchLike;
  indicator?: IndicatorDefinition;
  logContext?: LogContext;
}

function createSupabaseStore(config: AppConfig, credential: string) {
  const client = createStorageClient(config.supabaseUrl, credential);
  return {
    store: new SupabaseObjectStore(client.storage, config.storageBucket),
    close: async () => {
      await client.removeAllChannels();
    },
  };
}

/**
 * コンテキストを構築
 *
 * @throws {SecretRetrievalError} ストレージの認証情報が取得できない（起動失敗）
 */
export async function createJobContext(
  config: AppConfig,
  deps: JobContextDeps = {}
): Promise<JobContext> {
  const secretProvider = deps.secretProvider ?? createSecretProvider(config);
  const indicator = deps.indicator ?? INDICATOR_0008074;

  let credential: string;
  try {
    credential = await secretProvider.getSecret(config.storageSecretName);
  } finally {
    // 認証情報は起動時に1回だけ使う
    await secretProvider.close();
  }

  logger.info('Storage credential loaded', {
    secretBackend: config.secretBackend,
    secretName: config.storageSecretName,
  });

  const { store, close: closeStore } = (deps.createStore ?? createSupabaseStore)(config, credential);

  const ineClient = createIneClient({
    indicatorCode: indicator.code,
    baseUrl: config.ineBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl: deps.fetchImpl,
    logContext: deps.logContext,
  });

  let closed = false;

  return {
    config,
    indicator,
    ineClient,
    store,
    close: async () => {
      if (closed) return;
      closed = true;
      await closeStore?.();
      logger.debug('Job context closed');
    },
  };
}
