import { describe, it, expect, vi } from 'vitest';
import { createLogger, serializeError } from '@/lib/utils/logger';

/** 直近の console.log 出力を JSON として読む */
function lastLogLine(): Record<string, unknown> {
  const calls = vi.mocked(console.log).mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

describe('logger.ts', () => {
  describe('createLogger', () => {
    it('JSON 1行で出力し、デフォルトコンテキストを付与する', () => {
      createLogger({ module: 'etl/range' }).info('Data range discovered', { yearCount: 13 });

      const payload = lastLogLine();
      expect(payload).toMatchObject({
        level: 'info',
        message: 'Data range discovered',
        module: 'etl/range',
        yearCount: 13,
      });
      expect(typeof payload.timestamp).toBe('string');
    });

    it('error は console.error、warn は console.warn に出力する', () => {
      const logger = createLogger();
      logger.warn('Year skipped');
      logger.error('Upload failed');

      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('"level":"warn"'));
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('"level":"error"'));
    });

    it('error コンテキストはシリアライズする', () => {
      createLogger().error('Upload failed', { error: new Error('Bucket not found') });

      const [line] = vi.mocked(console.error).mock.calls[0];
      expect(JSON.parse(String(line)).error).toMatchObject({
        name: 'Error',
        message: 'Bucket not found',
      });
    });

    it('認証情報のキーは伏せる', () => {
      createLogger({ module: 'job-context' }).info('Storage credential loaded', {
        secretName: 'supabase-service-role-key',
        credential: 'test-secret',
        apiKey: 'test-secret',
      });

      expect(lastLogLine()).toMatchObject({
        secretName: 'supabase-service-role-key',
        credential: '[REDACTED]',
        apiKey: '[REDACTED]',
      });
    });

    it('undefined の値は出力しない', () => {
      createLogger().info('Year data unavailable, skipping', { statusCode: undefined });

      expect(lastLogLine()).not.toHaveProperty('statusCode');
    });

    it('startTimer は処理時間を返す', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-01-05T12:00:00Z'));
      const timer = createLogger().startTimer('Transform');

      vi.setSystemTime(new Date('2024-01-05T12:00:01.500Z'));
      const durationMs = timer.end({ rowCount: 10 });

      expect(durationMs).toBe(1500);
      expect(lastLogLine()).toMatchObject({
        message: 'Transform completed',
        durationMs: 1500,
        rowCount: 10,
      });
    });
  });

  describe('serializeError', () => {
    it('cause を再帰的に含める', () => {
      const error = new Error('outer', { cause: new Error('inner') });

      expect(serializeError(error)).toMatchObject({
        message: 'outer',
        cause: { message: 'inner' },
      });
    });

    it('Error 以外は文字列化する', () => {
      expect(serializeError('boom')).toEqual({ value: 'boom' });
    });
  });
});
