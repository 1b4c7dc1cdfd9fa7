/**
 * 年範囲の決定
 *
 * @description 最初の年で API に問い合わせ、UltimoPref（最新年）までの年トークンを生成する。
 * 失敗時は RangeDiscoveryError を投げ、後続ステージは実行させない。
 */

import { RangeDiscoveryError } from '../errors';
import type { IneClient } from '../ine/client';
import type { IndicatorDefinition } from '../ine/indicator-config';
import { buildYearParameters, toYearToken } from '../ine/year-parameters';
import { createLogger, type LogContext } from '../utils/logger';

export type LastYearSource = Pick<IneClient, 'getLastAvailableYear'>;

export interface DiscoverOptions {
  signal?: AbortSignal;
  logContext?: LogContext;
}

/**
 * 取得対象の年トークン一覧（昇順）を返す
 *
 * @throws {RangeDiscoveryError} 通信・HTTP・レスポンス形式のいずれかで失敗した場合
 */
export async function discoverYearParameters(
  client: LastYearSource,
  indicator: IndicatorDefinition,
  options: DiscoverOptions = {}
): Promise<string[]> {
  const { signal, logContext } = options;
  const logger = createLogger({ module: 'etl/range', ...logContext });
  const firstToken = toYearToken(indicator.firstYear, indicator.yearTokenPrefix);

  logger.info('Requesting data range', { yearToken: firstToken });

  let lastYear: number;
  try {
    lastYear = await client.getLastAvailableYear(firstToken, signal);
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    logger.error('Failed to discover data range', { yearToken: firstToken, error });
    throw new RangeDiscoveryError(
      `Could not determine last available year for indicator ${indicator.code}`,
      { cause: error }
    );
  }

  let tokens: string[];
  try {
    tokens = buildYearParameters(indicator.firstYear, lastYear, indicator.yearTokenPrefix);
  } catch (error) {
    throw new RangeDiscoveryError(
      `API reported last year ${lastYear}, before first year ${indicator.firstYear}`,
      { cause: error }
    );
  }

  logger.info('Data range discovered', {
    firstYear: indicator.firstYear,
    lastYear,
    yearCount: tokens.length,
  });

  return tokens;
}
