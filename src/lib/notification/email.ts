/**
 * メール通知（Resend）
 *
 * @description ジョブ失敗時（および任意で成功時）のメール通知。
 * 通知の失敗はログに残すだけで、ジョブの結果には影響させない。
 * @see https://resend.com/docs
 */

import { Resend } from 'resend';
import { createLogger } from '../utils/logger';
import { getJobFailureEmailTemplate, getJobSuccessEmailTemplate } from './templates';

const logger = createLogger({ module: 'email' });

const DEFAULT_FROM = 'INE ETL <noreply@resend.dev>';

export type JobName = 'ine-etl';

export interface JobFailureNotification {
  jobName: JobName;
  runId: string;
  /** 実行日（YYYYMMDD） */
  runDate?: string;
  /** 失敗したステージ（エラー名） */
  stage?: string;
  error: string;
  timestamp: Date;
}

export interface JobSuccessNotification {
  jobName: JobName;
  runId: string;
  runDate: string;
  rowCount: number;
  /** アップロードしたパス */
  paths: string[];
  /** 欠損年（例: "2015 (http)"） */
  missingYears: string[];
  durationMs?: number;
  timestamp: Date;
}

interface EmailSettings {
  apiKey: string;
  to: string;
  from: string;
}

/**
 * 環境変数から送信設定を読む（未設定の項目があれば null）
 */
function readEmailSettings(env: NodeJS.ProcessEnv = process.env): EmailSettings | null {
  const apiKey = env.RESEND_API_KEY;
  const to = env.ALERT_EMAIL_TO;
  if (!apiKey || !to) {
    logger.warn('Email notifications disabled', {
      resendApiKeySet: Boolean(apiKey),
      alertEmailToSet: Boolean(to),
    });
    return null;
  }
  return { apiKey, to, from: env.EMAIL_FROM || DEFAULT_FROM };
}

/**
 * 送信できた場合 true。失敗はログに残すだけで投げない
 */
async function deliver(
  kind: 'failure' | 'success',
  runId: string,
  message: { subject: string; html: string }
): Promise<boolean> {
  const settings = readEmailSettings();
  if (!settings) {
    logger.info('Email notification skipped (not configured)', { kind, runId });
    return false;
  }

  try {
    const { data, error } = await new Resend(settings.apiKey).emails.send({
      from: settings.from,
      to: [settings.to],
      subject: message.subject,
      html: message.html,
    });

    if (error) {
      logger.error('Notification email rejected', { kind, runId, reason: error.message });
      return false;
    }

    logger.info('Notification email sent', { kind, runId, emailId: data?.id });
    return true;
  } catch (error) {
    logger.error('Notification email failed', { kind, runId, error });
    return false;
  }
}

/**
 * ジョブ失敗通知メールを送信
 */
export async function sendJobFailureEmail(data: JobFailureNotification): Promise<boolean> {
  return deliver('failure', data.runId, getJobFailureEmailTemplate(data));
}

/**
 * ジョブ成功通知メールを送信（NOTIFY_ON_SUCCESS=true の場合のみ）
 */
export async function sendJobSuccessEmail(data: JobSuccessNotification): Promise<boolean> {
  if (process.env.NOTIFY_ON_SUCCESS !== 'true') {
    return false;
  }
  return deliver('success', data.runId, getJobSuccessEmailTemplate(data));
}
