import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    // 環境: Node.js（ブラウザAPIは不使用）
    environment: 'node',

    // グローバルAPI有効（describe, it, expect をimport不要に）
    globals: true,

    // テストファイルパターン
    include: ['src/tests/**/*.test.ts'],

    // セットアップファイル
    setupFiles: ['./src/tests/setup.ts'],

    // タイムアウト（ms）
    testTimeout: 10000,

    // モック設定
    mockReset: true,
    restoreMocks: true,

    // カバレッジ
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        // utils
        'src/lib/utils/date.ts',
        'src/lib/utils/csv.ts',
        'src/lib/utils/http.ts',
        'src/lib/utils/logger.ts',
        // config / secrets / storage
        'src/lib/config.ts',
        'src/lib/secrets/provider.ts',
        'src/lib/storage/object-store.ts',
        // INE API
        'src/lib/ine/client.ts',
        'src/lib/ine/year-parameters.ts',
        // ETL
        'src/lib/etl/range.ts',
        'src/lib/etl/fetch-raw.ts',
        'src/lib/etl/transform.ts',
        'src/lib/etl/sinks.ts',
        // cron
        'src/lib/cron/context.ts',
        'src/lib/cron/handlers/ine-etl.ts',
        // notification
        'src/lib/notification/email.ts',
        'src/lib/notification/templates.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },
  },

  // パスエイリアス
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
