/**
 * INE ETL 直接実行スクリプト（GH Actions のスケジュール実行用）
 *
 * @description
 * - CLI引数: --past-due（スケジュールより遅れて起動された場合に付与、ログ出力のみ）
 * - 環境変数は GH Actions secrets から、ローカルでは .env.local から読み込む
 * - SENTRY_DSN が設定されていれば失敗を Sentry に送る
 * - 成功時 exit 0、失敗時 exit 1
 */

import * as Sentry from '@sentry/node';
import { config as loadDotenv } from 'dotenv';
import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';
import { loadConfig } from '../../src/lib/config';
import { handleIneEtl, TimerTriggerSchema, type TimerTrigger } from '../../src/lib/cron/handlers/ine-etl';
import { errorMessage } from '../../src/lib/errors';
import { createLogger } from '../../src/lib/utils/logger';

const logger = createLogger({ module: 'ine-etl-direct' });

/**
 * CLI 引数をパース
 */
function parseArgs(argv: string[]): TimerTrigger {
  const known = new Set(['--past-due']);
  for (const arg of argv) {
    if (!known.has(arg)) {
      throw new Error(`Unknown argument: ${arg}. Valid arguments: ${[...known].join(', ')}`);
    }
  }
  return TimerTriggerSchema.parse({ pastDue: argv.includes('--past-due') });
}

async function main(): Promise<boolean> {
  loadDotenv({ path: resolve(process.cwd(), '.env.local') });

  if (process.env.SENTRY_DSN) {
    Sentry.init({ dsn: process.env.SENTRY_DSN, environment: process.env.NODE_ENV });
  }

  const trigger = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const runId = randomUUID();

  logger.info('Starting INE ETL direct execution', { runId, pastDue: trigger.pastDue });

  const result = await handleIneEtl(trigger, runId, { config });

  const output = {
    success: result.success,
    runId,
    runDate: result.runDate,
    rowCount: result.rowCount,
    yearsLoaded: result.yearsLoaded,
    missingYears: result.missingYears.length > 0 ? result.missingYears : undefined,
    extractPath: result.extractPath,
    dataPath: result.dataPath,
    errors: result.errors.length > 0 ? result.errors : undefined,
  };

  logger.info('INE ETL finished', { runId, success: result.success });
  console.log(JSON.stringify(output, null, 2));

  return result.success;
}

main()
  .catch((error: unknown) => {
    logger.error('Script failed', { error: errorMessage(error) });
    Sentry.captureException(error);
    return false;
  })
  .then(async (success) => {
    await Sentry.flush(2000);
    process.exit(success ? 0 : 1);
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
