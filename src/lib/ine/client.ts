/**
 * INE 指標 API クライアント
 *
 * @description `pindica.jsp` から指標データを年単位で取得
 * @see https://www.ine.pt/xportal/xmain?xpid=INE&xpgid=ine_api
 */

import { z } from 'zod';
import { fetchTextWithTimeout, type FetchLike } from '../utils/http';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { ResponseShapeError } from '../errors';
import type { IneDados } from './types';

export const DEFAULT_INE_BASE_URL = 'https://www.ine.pt/ine/json_indicador/pindica.jsp';

/** 範囲取得用: 先頭要素に UltimoPref があること */
const LastPeriodResponseSchema = z
  .array(
    z
      .object({
        UltimoPref: z.union([z.string(), z.number()]),
      })
      .passthrough()
  )
  .min(1);

/** 年データ取得用: 先頭要素に Dados オブジェクトがあること */
const YearDataResponseSchema = z
  .array(
    z
      .object({
        Dados: z.record(z.unknown()),
      })
      .passthrough()
  )
  .min(1);

export interface IneClientOptions {
  /** 指標コード（varcd） */
  indicatorCode: string;
  /** API ベース URL（デフォルト: INE 公式） */
  baseUrl?: string;
  /** リクエストタイムアウト（ミリ秒、デフォルト: 30000） */
  timeoutMs?: number;
  /** 言語（デフォルト: EN） */
  lang?: string;
  /** テスト用 fetch 差し替え */
  fetchImpl?: FetchLike;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

/**
 * INE 指標 API クライアント
 */
export class IneClient {
  private readonly indicatorCode: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly lang: string;
  private readonly fetchImpl?: FetchLike;
  private readonly logger: Logger;

  constructor(options: IneClientOptions) {
    this.indicatorCode = options.indicatorCode;
    this.baseUrl = options.baseUrl ?? DEFAULT_INE_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.lang = options.lang ?? 'EN';
    this.fetchImpl = options.fetchImpl;
    this.logger = createLogger({ module: 'ine-client', ...options.logContext });
  }

  /**
   * 年トークンを指定したリクエスト URL を構築
   *
   * `<base>?varcd=<indicator>&lang=EN&op=2&Dim1=<token>`
   */
  buildUrl(yearToken: string): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('varcd', this.indicatorCode);
    url.searchParams.set('lang', this.lang);
    url.searchParams.set('op', '2');
    url.searchParams.set('Dim1', yearToken);
    return url.toString();
  }

  /**
   * APIリクエストを実行し JSON を返す
   *
   * 本文の読み込み中のタイムアウトは TransportError、パースできない本文だけが ResponseShapeError
   */
  private async request(yearToken: string, signal?: AbortSignal): Promise<unknown> {
    const url = this.buildUrl(yearToken);

    this.logger.debug('INE API request', { yearToken, url });

    const text = await fetchTextWithTimeout(url, {
      timeoutMs: this.timeoutMs,
      signal,
      fetchImpl: this.fetchImpl,
    });

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ResponseShapeError(`Response for ${yearToken} is not valid JSON`, { cause: error });
    }
  }

  /**
   * 最新の参照年（UltimoPref）を取得
   *
   * @param yearToken 問い合わせに使う年トークン（通常は最初の年）
   * @throws {ResponseShapeError} UltimoPref が無い・4桁の年でない
   */
  async getLastAvailableYear(yearToken: string, signal?: AbortSignal): Promise<number> {
    const body = await this.request(yearToken, signal);

    const parsed = LastPeriodResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseShapeError(
        `Response for ${yearToken} has no UltimoPref field`,
        { cause: parsed.error }
      );
    }

    const raw = String(parsed.data[0].UltimoPref).trim();
    if (!/^\d{4}$/.test(raw)) {
      throw new ResponseShapeError(`UltimoPref is not a year: "${raw}"`);
    }

    return Number(raw);
  }

  /**
   * 1年分の Dados を取得
   *
   * @returns 年ラベル → 観測値配列
   * @throws {ResponseShapeError} 先頭要素に Dados オブジェクトが無い
   */
  async getYearData(yearToken: string, signal?: AbortSignal): Promise<IneDados> {
    const body = await this.request(yearToken, signal);

    const parsed = YearDataResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseShapeError(
        `Response for ${yearToken} has no Dados object`,
        { cause: parsed.error }
      );
    }

    return parsed.data[0].Dados;
  }
}

/**
 * クライアントインスタンスを作成
 */
export function createIneClient(options: IneClientOptions): IneClient {
  return new IneClient(options);
}
