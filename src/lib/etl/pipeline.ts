/**
 * ETL パイプライン本体
 *
 * @description 範囲決定 → 生データ取得 → (生データ保存 / 変換 + CSV 保存)。
 * 生データ保存の成否にかかわらず変換と CSV 保存は実行し、どちらかが失敗していればラン全体を失敗とする。
 */

import { JobDeadlineError, PipelineError } from '../errors';
import type { IneClient } from '../ine/client';
import type { IndicatorDefinition } from '../ine/indicator-config';
import type { ObjectStore } from '../storage/object-store';
import { createLogger, type LogContext } from '../utils/logger';
import { fetchRawData, type MissingYear } from './fetch-raw';
import { discoverYearParameters } from './range';
import { dataPath, extractPath, loadCleanData, loadRawData } from './sinks';
import { transformRawData } from './transform';

export interface PipelineDeps {
  ineClient: Pick<IneClient, 'getLastAvailableYear' | 'getYearData'>;
  store: ObjectStore;
  indicator: IndicatorDefinition;
}

export interface PipelineOptions {
  /** 実行日（YYYYMMDD） */
  runDate: string;
  signal?: AbortSignal;
  logContext?: LogContext;
}

export interface PipelineResult {
  runDate: string;
  /** 要求した年トークン */
  yearsRequested: string[];
  /** 生データに含まれる年ラベル */
  yearsLoaded: string[];
  missingYears: MissingYear[];
  rowCount: number;
  extractPath: string;
  dataPath: string;
}

/**
 * ジョブ全体の期限を表すシグナル
 *
 * 使い終わったら clear() でタイマーを解除すること
 */
export function createDeadline(deadlineMs: number): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new JobDeadlineError(deadlineMs)), deadlineMs);
  return {
    signal: controller.signal,
    clear: () => clearTimeout(timer),
  };
}

/**
 * パイプラインを1回実行
 *
 * @throws {RangeDiscoveryError} 年範囲が決まらない（取得は行わない）
 * @throws {TransformError} 変換失敗
 * @throws {StorageUploadError} いずれかのアップロード失敗
 * @throws {PipelineError} 生データ保存と変換/CSV 保存の両方が失敗
 */
export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<PipelineResult> {
  const { ineClient, store, indicator } = deps;
  const { runDate, signal, logContext = {} } = options;
  const logger = createLogger({ module: 'etl/pipeline', ...logContext, runDate });

  const yearTokens = await discoverYearParameters(ineClient, indicator, { signal, logContext });

  const { data, missing } = await fetchRawData(ineClient, yearTokens, { signal, logContext });
  if (missing.length > 0) {
    logger.warn('Some years are missing from the extraction', {
      missingYears: missing.map((m) => `${m.year} (${m.reason})`),
    });
  }

  signal?.throwIfAborted();

  const failures: Array<{ stage: 'raw-sink' | 'clean-sink'; error: unknown }> = [];

  try {
    await loadRawData(store, data, runDate, logContext);
  } catch (error) {
    logger.error('Raw data load failed', { error });
    failures.push({ stage: 'raw-sink', error });
  }

  signal?.throwIfAborted();

  let rowCount = 0;
  try {
    const table = transformRawData(data, indicator, logContext);
    rowCount = table.rows.length;
    await loadCleanData(store, table, runDate, logContext);
  } catch (error) {
    logger.error('Transform or clean data load failed', { error });
    failures.push({ stage: 'clean-sink', error });
  }

  if (failures.length === 1) {
    throw failures[0].error;
  }
  if (failures.length > 1) {
    throw new PipelineError(
      `Pipeline failed in stages: ${failures.map((f) => f.stage).join(', ')}`,
      failures
    );
  }

  return {
    runDate,
    yearsRequested: yearTokens,
    yearsLoaded: [...data.keys()],
    missingYears: missing,
    rowCount,
    extractPath: extractPath(runDate),
    dataPath: dataPath(runDate),
  };
}
