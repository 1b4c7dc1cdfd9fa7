/**
 * 出力シンク
 *
 * @description 生データ（JSON）とクリーンデータ（CSV）を実行日付きのパスにアップロードする。
 * 実行日は呼び出し側から渡す（関数内で時計を読まない）。
 */

import type { RawMapping } from '../ine/types';
import type { ObjectStore } from '../storage/object-store';
import { toCsv } from '../utils/csv';
import { isCompactDate } from '../utils/date';
import { createLogger, type LogContext } from '../utils/logger';
import type { CleanTable } from './transform';

function assertRunDate(runDate: string): void {
  if (!isCompactDate(runDate)) {
    throw new RangeError(`Run date must be YYYYMMDD, got "${runDate}"`);
  }
}

/**
 * `extract/extract-<YYYYMMDD>.json`
 */
export function extractPath(runDate: string): string {
  assertRunDate(runDate);
  return `extract/extract-${runDate}.json`;
}

/**
 * `data/data-<YYYYMMDD>.csv`
 */
export function dataPath(runDate: string): string {
  assertRunDate(runDate);
  return `data/data-${runDate}.csv`;
}

/**
 * 生データを4スペースインデントの JSON にする
 */
export function serializeRawData(raw: RawMapping): string {
  return JSON.stringify(Object.fromEntries(raw), null, 4);
}

/**
 * JSON テキストを生データに戻す
 */
export function parseRawData(json: string): RawMapping {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new TypeError('Raw data JSON must be an object');
  }
  return new Map(Object.entries(parsed));
}

/**
 * 生データを `extract/` にアップロード
 *
 * @throws {StorageUploadError}
 */
export async function loadRawData(
  store: ObjectStore,
  raw: RawMapping,
  runDate: string,
  logContext: LogContext = {}
): Promise<void> {
  const logger = createLogger({ module: 'etl/sinks', ...logContext });
  const path = extractPath(runDate);

  await store.upload(path, serializeRawData(raw), 'application/json');

  logger.info('Extraction loaded', { path, years: raw.size });
}

/**
 * クリーンデータを `data/` に CSV でアップロード
 *
 * @throws {StorageUploadError}
 */
export async function loadCleanData(
  store: ObjectStore,
  table: CleanTable,
  runDate: string,
  logContext: LogContext = {}
): Promise<void> {
  const logger = createLogger({ module: 'etl/sinks', ...logContext });
  const path = dataPath(runDate);

  await store.upload(path, toCsv(table.columns, table.rows), 'text/csv');

  logger.info('Clean data loaded', { path, rowCount: table.rows.length });
}
