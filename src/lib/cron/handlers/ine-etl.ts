/**
 * INE ETL ハンドラー
 *
 * @description 指標 0008074 を年単位で取得し、生データ JSON とクリーン CSV を Storage に保存する
 */

import { captureException } from '@sentry/node';
import { z } from 'zod';
import type { AppConfig } from '../../config';
import { errorMessage } from '../../errors';
import { createDeadline, runPipeline } from '../../etl/pipeline';
import type { MissingYear } from '../../etl/fetch-raw';
import { sendJobFailureEmail, sendJobSuccessEmail, type JobName } from '../../notification/email';
import { getRunDate } from '../../utils/date';
import { createLogger, type LogContext } from '../../utils/logger';
import { createJobContext, type JobContext, type JobContextDeps } from '../context';

const JOB_NAME: JobName = 'ine-etl';

const logger = createLogger({ module: 'ine-etl' });

/** タイマートリガーの入力 */
export const TimerTriggerSchema = z.object({
  /** 予定時刻を過ぎてから起動されたか（ログに残すのみ） */
  pastDue: z.boolean().default(false),
});

export type TimerTrigger = z.infer<typeof TimerTriggerSchema>;

export interface IneEtlResult {
  success: boolean;
  runId: string;
  runDate: string;
  pastDue: boolean;
  yearsRequested: number;
  yearsLoaded: string[];
  missingYears: MissingYear[];
  rowCount: number;
  extractPath?: string;
  dataPath?: string;
  errors: string[];
}

export interface HandleIneEtlOptions {
  config: AppConfig;
  /** 実行日の基準時刻（省略時は現在時刻） */
  now?: Date;
  deps?: JobContextDeps;
}

/**
 * INE ETL メインハンドラー
 *
 * 例外は投げず、失敗は success: false で返す（通知メール送信済み）
 */
export async function handleIneEtl(
  trigger: TimerTrigger,
  runId: string,
  options: HandleIneEtlOptions
): Promise<IneEtlResult> {
  const { config, now = new Date(), deps = {} } = options;
  const runDate = getRunDate(now, config.timeZone);
  const logContext: LogContext = { jobName: JOB_NAME, runId };
  const timer = logger.startTimer('INE ETL');

  logger.info('Starting INE ETL handler', { runId, runDate, pastDue: trigger.pastDue });

  if (trigger.pastDue) {
    logger.warn('The timer is past due', { runId });
  }

  const result: IneEtlResult = {
    success: false,
    runId,
    runDate,
    pastDue: trigger.pastDue,
    yearsRequested: 0,
    yearsLoaded: [],
    missingYears: [],
    rowCount: 0,
    errors: [],
  };

  const deadline = createDeadline(config.jobDeadlineMs);
  let context: JobContext | undefined;

  try {
    context = await createJobContext(config, { ...deps, logContext });

    const pipeline = await runPipeline(context, {
      runDate,
      signal: deadline.signal,
      logContext,
    });

    result.success = true;
    result.yearsRequested = pipeline.yearsRequested.length;
    result.yearsLoaded = pipeline.yearsLoaded;
    result.missingYears = pipeline.missingYears;
    result.rowCount = pipeline.rowCount;
    result.extractPath = pipeline.extractPath;
    result.dataPath = pipeline.dataPath;

    const durationMs = timer.end({
      runId,
      rowCount: pipeline.rowCount,
      yearsLoaded: pipeline.yearsLoaded.length,
      missingYears: pipeline.missingYears.length,
    });

    await sendJobSuccessEmail({
      jobName: JOB_NAME,
      runId,
      runDate,
      rowCount: pipeline.rowCount,
      paths: [pipeline.extractPath, pipeline.dataPath],
      missingYears: pipeline.missingYears.map((m) => `${m.year} (${m.reason})`),
      durationMs,
      timestamp: new Date(),
    });

    return result;
  } catch (error) {
    const message = errorMessage(error);
    timer.endWithError(error, { runId });
    captureException(error, { tags: { jobName: JOB_NAME, runId, runDate } });

    await sendJobFailureEmail({
      jobName: JOB_NAME,
      runId,
      runDate,
      stage: error instanceof Error ? error.name : undefined,
      error: message,
      timestamp: new Date(),
    });

    return { ...result, success: false, errors: [message] };
  } finally {
    deadline.clear();
    if (context) {
      try {
        await context.close();
      } catch (closeError) {
        logger.warn('Failed to close job context', { runId, error: closeError });
      }
    }
  }
}
