/**
 * メールテンプレート
 *
 * @description ETL ジョブ通知用の HTML メール。埋め込む値はすべてエスケープする。
 */

import type { JobFailureNotification, JobSuccessNotification } from './email';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

/**
 * HTMLエスケープ
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const BODY_STYLE =
  "font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;";
const CELL_STYLE = 'padding: 12px; border-bottom: 1px solid #e5e7eb;';

/**
 * 項目名・値の表を生成（値はエスケープ済みで渡すこと）
 */
function renderTable(rows: Array<[label: string, escapedValue: string]>): string {
  const body = rows
    .map(
      ([label, value]) => `
    <tr>
      <td style="${CELL_STYLE} font-weight: bold; width: 140px;">${label}</td>
      <td style="${CELL_STYLE}">${value}</td>
    </tr>`
    )
    .join('');
  return `<table style="width: 100%; border-collapse: collapse; margin-bottom: 20px;">${body}
  </table>`;
}

function renderDocument(title: string, content: string): string {
  return `
<!DOCTYPE html>
<html lang="ja">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
</head>
<body style="${BODY_STYLE}">
${content}
  <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 20px 0;">
  <p style="color: #9ca3af; font-size: 12px; margin: 0;">
    このメールは INE データ取得ジョブから自動送信されています。
  </p>
</body>
</html>
`;
}

/**
 * 失敗通知メールテンプレート
 */
export function getJobFailureEmailTemplate(
  data: JobFailureNotification
): { subject: string; html: string } {
  const runDate = data.runDate ?? '未指定';
  const subject = `[ALERT] ${data.jobName} 失敗 - ${runDate}`;

  const content = `
  <div style="background-color: #fef2f2; border: 1px solid #fecaca; border-radius: 8px; padding: 20px; margin-bottom: 20px;">
    <h1 style="color: #dc2626; margin: 0 0 10px 0; font-size: 24px;">ジョブ失敗通知</h1>
    <p style="color: #991b1b; margin: 0;">${escapeHtml(data.jobName)} の実行に失敗しました</p>
  </div>
  ${renderTable([
    ['Run ID', `<code>${escapeHtml(data.runId)}</code>`],
    ['実行日', escapeHtml(runDate)],
    ['失敗ステージ', escapeHtml(data.stage ?? '不明')],
    ['発生時刻', data.timestamp.toISOString()],
  ])}
  <pre style="margin: 0; font-size: 13px; white-space: pre-wrap; word-break: break-word; color: #dc2626; background-color: #fff; padding: 12px; border-radius: 4px; border: 1px solid #fecaca;">
${escapeHtml(data.error)}
  </pre>`;

  return { subject, html: renderDocument('ジョブ失敗通知', content) };
}

/**
 * 成功通知メールテンプレート
 *
 * 欠損年があれば一覧を添える
 */
export function getJobSuccessEmailTemplate(
  data: JobSuccessNotification
): { subject: string; html: string } {
  const subject = `[OK] ${data.jobName} 完了 - ${data.runDate}`;
  const duration = data.durationMs !== undefined
    ? `${(data.durationMs / 1000).toFixed(2)}秒`
    : '不明';

  const missing = data.missingYears.length > 0
    ? `
  <div style="background-color: #fef3c7; border: 1px solid #fde68a; border-radius: 8px; padding: 16px;">
    <strong>取得できなかった年:</strong>
    <ul style="margin: 8px 0 0 0;">
      ${data.missingYears.map((m) => `<li>${escapeHtml(m)}</li>`).join('')}
    </ul>
  </div>`
    : '';

  const content = `
  <div style="background-color: #f0fdf4; border: 1px solid #bbf7d0; border-radius: 8px; padding: 20px; margin-bottom: 20px;">
    <h1 style="color: #16a34a; margin: 0 0 10px 0; font-size: 24px;">ジョブ完了通知</h1>
  </div>
  ${renderTable([
    ['Run ID', `<code>${escapeHtml(data.runId)}</code>`],
    ['実行日', escapeHtml(data.runDate)],
    ['出力行数', `${data.rowCount} 行`],
    ['出力ファイル', data.paths.map(escapeHtml).join('<br>')],
    ['処理時間', duration],
  ])}${missing}`;

  return { subject, html: renderDocument('ジョブ完了通知', content) };
}
