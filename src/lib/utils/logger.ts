/**
 * 構造化ロギング
 *
 * @description GitHub Actions のログで grep / jq しやすい JSON 1行形式。
 * 認証情報らしいキーの値は出力前に伏せる。
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  module?: string;
  jobName?: string;
  /** 実行ID (UUID) */
  runId?: string;
  /** YYYYMMDD */
  runDate?: string;
  /** 例: S7A2011 */
  yearToken?: string;
  rowCount?: number;
  durationMs?: number;
  [key: string]: unknown;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const CONSOLE_METHOD: Record<LogLevel, 'log' | 'warn' | 'error'> = {
  debug: 'log',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

const REDACTED = '[REDACTED]';
const SENSITIVE_KEY = /^(password|credential|api[-_]?key|service[-_]?role[-_]?key|access[-_]?token|secret[-_]?(value|string))$/i;

function parseLevel(value: string | undefined): LogLevel | undefined {
  return LEVELS.find((level) => level === value?.toLowerCase());
}

// モジュールロード時に一度だけ評価
const MIN_LEVEL: LogLevel =
  parseLevel(process.env.LOG_LEVEL) ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

function isEnabled(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(MIN_LEVEL);
}

/**
 * Error を JSON 化できる形に（スタックは5行まで、cause は再帰）
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { value: String(error) };
  }
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack?.split('\n').slice(0, 5).join('\n'),
  };
  if (error.cause !== undefined) {
    serialized.cause = serializeError(error.cause);
  }
  return serialized;
}

/**
 * ログ出力用にコンテキストを整形（undefined は落とす）
 */
function prepareContext(context: LogContext): Record<string, unknown> {
  const prepared: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    if (key === 'error') {
      prepared.error = serializeError(value);
    } else if (SENSITIVE_KEY.test(key)) {
      prepared[key] = REDACTED;
    } else {
      prepared[key] = value;
    }
  }
  return prepared;
}

/**
 * ロガーを作成
 *
 * @example
 * ```typescript
 * const logger = createLogger({ module: 'etl/fetch-raw', runId });
 * logger.info('Year data extracted', { yearToken: 'S7A2011' });
 * logger.warn('Year data unavailable, skipping', { yearToken: 'S7A2015', error });
 * ```
 */
export function createLogger(defaultContext: LogContext = {}) {
  const write = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (!isEnabled(level)) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...prepareContext({ ...defaultContext, ...context }),
    });
    console[CONSOLE_METHOD[level]](line);
  };

  return {
    debug: (message: string, context?: LogContext) => write('debug', message, context),
    info: (message: string, context?: LogContext) => write('info', message, context),
    warn: (message: string, context?: LogContext) => write('warn', message, context),
    error: (message: string, context?: LogContext) => write('error', message, context),

    /**
     * 処理時間の計測。end / endWithError は経過ミリ秒を返す
     */
    startTimer: (label: string) => {
      const startedAt = Date.now();
      return {
        end: (context?: LogContext) => {
          const durationMs = Date.now() - startedAt;
          write('info', `${label} completed`, { ...context, durationMs });
          return durationMs;
        },
        endWithError: (error: unknown, context?: LogContext) => {
          const durationMs = Date.now() - startedAt;
          write('error', `${label} failed`, { ...context, durationMs, error });
          return durationMs;
        },
      };
    },
  };
}

export type Logger = ReturnType<typeof createLogger>;
