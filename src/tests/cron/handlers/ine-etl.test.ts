/**
 * cron/handlers/ine-etl.ts のテスト
 *
 * INE API は fetch スタブ、Storage はインメモリ、シークレットは環境変数バックエンド
 */

import { describe, it, expect, vi } from 'vitest';

const { mockSendJobFailureEmail, mockSendJobSuccessEmail } = vi.hoisted(() => ({
  mockSendJobFailureEmail: vi.fn(),
  mockSendJobSuccessEmail: vi.fn(),
}));

vi.mock('@/lib/notification/email', () => ({
  sendJobFailureEmail: mockSendJobFailureEmail,
  sendJobSuccessEmail: mockSendJobSuccessEmail,
}));

import { loadConfig } from '@/lib/config';
import { handleIneEtl, TimerTriggerSchema } from '@/lib/cron/handlers/ine-etl';
import { EnvSecretProvider } from '@/lib/secrets/provider';
import type { FetchLike } from '@/lib/utils/http';
import {
  createHangingFetch,
  createIneFetchStub,
  indicatorBody,
  jsonResponse,
  observation,
} from '../../helpers/ine-fixtures';
import { MemoryObjectStore } from '../../helpers/memory-object-store';

const RUN_ID = 'run-0001';
const NOW = new Date('2024-01-05T12:00:00Z');

function setup(options: {
  fetchImpl: FetchLike;
  secrets?: NodeJS.ProcessEnv;
  env?: NodeJS.ProcessEnv;
}) {
  const store = new MemoryObjectStore();
  const closeStore = vi.fn(async () => {});
  const createStore = vi.fn((_config: unknown, _credential: string) => ({ store, close: closeStore }));
  const config = loadConfig({ SUPABASE_URL: 'https://example.supabase.co', ...options.env });

  return {
    store,
    closeStore,
    createStore,
    run: (pastDue = false) =>
      handleIneEtl({ pastDue }, RUN_ID, {
        config,
        now: NOW,
        deps: {
          secretProvider: new EnvSecretProvider(
            options.secrets ?? { SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }
          ),
          createStore,
          fetchImpl: options.fetchImpl,
        },
      }),
  };
}

const singleYearRoutes = {
  S7A2011: () =>
    jsonResponse(indicatorBody('2011', { '2011': [observation(), observation({ geocod: '11', geodsg: 'Norte' })] })),
};

describe('cron/handlers/ine-etl.ts', () => {
  describe('TimerTriggerSchema', () => {
    it('pastDue のデフォルトは false', () => {
      expect(TimerTriggerSchema.parse({})).toEqual({ pastDue: false });
    });
  });

  describe('handleIneEtl', () => {
    it('成功時は実行日付きのパスに保存し、成功通知を呼ぶ', async () => {
      const { store, createStore, closeStore, run } = setup({
        fetchImpl: createIneFetchStub(singleYearRoutes),
      });

      const result = await run();

      expect(result).toEqual({
        success: true,
        runId: RUN_ID,
        runDate: '20240105',
        pastDue: false,
        yearsRequested: 1,
        yearsLoaded: ['2011'],
        missingYears: [],
        rowCount: 2,
        extractPath: 'extract/extract-20240105.json',
        dataPath: 'data/data-20240105.csv',
        errors: [],
      });
      expect(store.uploads).toEqual(['extract/extract-20240105.json', 'data/data-20240105.csv']);
      expect(createStore).toHaveBeenCalledWith(expect.anything(), 'test-secret');
      expect(closeStore).toHaveBeenCalledTimes(1);
      expect(mockSendJobSuccessEmail).toHaveBeenCalledWith(
        expect.objectContaining({
          jobName: 'ine-etl',
          runId: RUN_ID,
          runDate: '20240105',
          rowCount: 2,
          paths: ['extract/extract-20240105.json', 'data/data-20240105.csv'],
          missingYears: [],
        })
      );
      expect(mockSendJobFailureEmail).not.toHaveBeenCalled();
    });

    it('pastDue は警告ログを出して通常どおり実行する', async () => {
      const { run } = setup({ fetchImpl: createIneFetchStub(singleYearRoutes) });

      const result = await run(true);

      expect(result.success).toBe(true);
      expect(result.pastDue).toBe(true);
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('"message":"The timer is past due"'));
    });

    it('認証情報が無ければ API を呼ばずに失敗する', async () => {
      const fetchImpl = createIneFetchStub(singleYearRoutes);
      const { createStore, run } = setup({ fetchImpl, secrets: {} });

      const result = await run();

      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        'Secret supabase-service-role-key is not set (env.SUPABASE_SERVICE_ROLE_KEY)',
      ]);
      expect(fetchImpl).not.toHaveBeenCalled();
      expect(createStore).not.toHaveBeenCalled();
      expect(mockSendJobFailureEmail).toHaveBeenCalledWith(
        expect.objectContaining({
          jobName: 'ine-etl',
          runId: RUN_ID,
          runDate: '20240105',
          stage: 'SecretRetrievalError',
        })
      );
    });

    it('年範囲が決まらなければ何も保存せずに失敗する', async () => {
      const { store, closeStore, run } = setup({ fetchImpl: createIneFetchStub({}) });

      const result = await run();

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['Could not determine last available year for indicator 0008074']);
      expect(result.yearsRequested).toBe(0);
      expect(store.uploads).toEqual([]);
      expect(closeStore).toHaveBeenCalledTimes(1);
      expect(mockSendJobFailureEmail).toHaveBeenCalledWith(
        expect.objectContaining({ stage: 'RangeDiscoveryError' })
      );
      expect(mockSendJobSuccessEmail).not.toHaveBeenCalled();
    });

    it('ジョブ期限を超えたら中断して失敗する', async () => {
      const { store, run } = setup({
        fetchImpl: createHangingFetch(),
        env: { JOB_DEADLINE_MS: '20' },
      });

      const result = await run();

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['Job exceeded deadline of 20ms']);
      expect(store.uploads).toEqual([]);
      expect(mockSendJobFailureEmail).toHaveBeenCalledWith(
        expect.objectContaining({ stage: 'JobDeadlineError' })
      );
    });
  });
});
