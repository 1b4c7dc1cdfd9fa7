/**
 * HTTP ユーティリティ
 *
 * @description タイムアウト付き fetch と HTTP エラー分類。
 * リトライは行わない（失敗は呼び出し側でログに残して扱いを決める）。
 */

/**
 * HTTP ステータスエラー（200 以外の応答）
 */
export class HttpStatusError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

/**
 * 通信エラー（DNS・接続断・リクエストタイムアウト）
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchWithTimeoutOptions {
  /** リクエスト単位のタイムアウト（ミリ秒） */
  timeoutMs: number;
  /** ジョブ全体の中断シグナル（期限切れ時に発火） */
  signal?: AbortSignal;
  /** テスト用に差し替え可能な fetch 実装 */
  fetchImpl?: FetchLike;
  headers?: Record<string, string>;
}

/**
 * fetch / 本文読み込みの失敗を分類
 *
 * ジョブ全体の中断はその理由、リクエスト単位のタイムアウトと通信断は TransportError
 */
function toTransportFailure(
  error: unknown,
  stage: 'Request' | 'Response body',
  timeoutMs: number,
  signal: AbortSignal | undefined,
  timeoutSignal: AbortSignal
): unknown {
  if (signal?.aborted) {
    return signal.reason;
  }
  if (timeoutSignal.aborted) {
    return new TransportError(`${stage} timed out after ${timeoutMs}ms`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${stage} failed: ${message}`, { cause: error });
}

async function send(
  url: string,
  options: FetchWithTimeoutOptions,
  timeoutSignal: AbortSignal
): Promise<Response> {
  const { timeoutMs, signal, fetchImpl = fetch, headers } = options;
  const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        ...headers,
      },
      signal: combined,
    });
  } catch (error) {
    throw toTransportFailure(error, 'Request', timeoutMs, signal, timeoutSignal);
  }

  if (response.status !== 200) {
    throw new HttpStatusError(
      `HTTP ${response.status}: ${response.statusText}`,
      response.status
    );
  }

  return response;
}

/**
 * タイムアウト付き GET（本文をテキストで返す）
 *
 * - 200 以外は HttpStatusError
 * - ジョブ全体のシグナルが中断済みなら、その理由をそのまま投げる
 * - それ以外の失敗は TransportError。タイムアウトは本文の読み終わりまでを含む
 *
 * @example
 * ```typescript
 * const text = await fetchTextWithTimeout('https://www.ine.pt/...', { timeoutMs: 30000 });
 * const body: unknown = JSON.parse(text);
 * ```
 */
export async function fetchTextWithTimeout(
  url: string,
  options: FetchWithTimeoutOptions
): Promise<string> {
  const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
  const response = await send(url, options, timeoutSignal);

  try {
    return await response.text();
  } catch (error) {
    throw toTransportFailure(error, 'Response body', options.timeoutMs, options.signal, timeoutSignal);
  }
}
