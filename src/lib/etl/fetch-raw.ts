/**
 * 生データ取得
 *
 * @description 年トークンごとに1リクエスト（逐次）。取得できた年の Dados を1つのマッピングにマージする。
 * 年単位の失敗（HTTP・通信・レスポンス形式）はログに残して欠損年として記録し、ループは継続する。
 */

import { ResponseShapeError } from '../errors';
import type { IneClient } from '../ine/client';
import type { RawMapping } from '../ine/types';
import { yearFromToken } from '../ine/year-parameters';
import { HttpStatusError, TransportError } from '../utils/http';
import { createLogger, type LogContext } from '../utils/logger';

export type YearDataSource = Pick<IneClient, 'getYearData'>;

export type MissingYearReason = 'http' | 'transport' | 'shape';

export interface MissingYear {
  yearToken: string;
  year: string;
  reason: MissingYearReason;
  message: string;
  /** reason が http の場合のステータスコード */
  statusCode?: number;
}

export interface RawFetchResult {
  /** 年ラベル → 観測値（取得順） */
  data: RawMapping;
  /** 取得できなかった年 */
  missing: MissingYear[];
}

export interface FetchRawOptions {
  signal?: AbortSignal;
  logContext?: LogContext;
}

/**
 * 年単位で握るエラーを分類（それ以外は null = 再送出）
 */
function classifyYearError(error: unknown): Omit<MissingYear, 'yearToken' | 'year'> | null {
  if (error instanceof HttpStatusError) {
    return { reason: 'http', message: error.message, statusCode: error.statusCode };
  }
  if (error instanceof TransportError) {
    return { reason: 'transport', message: error.message };
  }
  if (error instanceof ResponseShapeError) {
    return { reason: 'shape', message: error.message };
  }
  return null;
}

/**
 * 全年分の生データを取得
 */
export async function fetchRawData(
  client: YearDataSource,
  yearTokens: readonly string[],
  options: FetchRawOptions = {}
): Promise<RawFetchResult> {
  const { signal, logContext } = options;
  const logger = createLogger({ module: 'etl/fetch-raw', ...logContext });

  const data: RawMapping = new Map();
  const missing: MissingYear[] = [];

  for (const yearToken of yearTokens) {
    signal?.throwIfAborted();
    const year = yearFromToken(yearToken);

    try {
      const dados = await client.getYearData(yearToken, signal);
      const entries = Object.entries(dados);

      if (entries.length === 0) {
        throw new ResponseShapeError(`Dados for ${yearToken} is empty`);
      }

      for (const [label, records] of entries) {
        data.set(label, records);
      }

      logger.info('Year data extracted', {
        yearToken,
        labels: entries.map(([label]) => label),
      });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      const classified = classifyYearError(error);
      if (!classified) {
        throw error;
      }

      logger.warn('Year data unavailable, skipping', {
        yearToken,
        reason: classified.reason,
        statusCode: classified.statusCode,
        error,
      });
      missing.push({ yearToken, year, ...classified });
    }
  }

  logger.info('Raw data fetch finished', {
    requested: yearTokens.length,
    loaded: data.size,
    missing: missing.length,
  });

  return { data, missing };
}
