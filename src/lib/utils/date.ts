/**
 * 実行日ユーティリティ
 *
 * @description 出力ファイル名に使う「今日」をタイムゾーン指定で求める。
 * 時計は呼び出し側が渡し、シンク関数は日付文字列だけを受け取る。
 */

/**
 * タイムゾーン別 YYYY-MM-DD フォーマッター（sv-SE ロケールは ISO 8601 形式を出力する）
 */
const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getDateFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('sv-SE', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * 指定タイムゾーンでの日付を取得（YYYY-MM-DD形式）
 */
export function getLocalDate(date: Date = new Date(), timeZone = 'Europe/Lisbon'): string {
  return getDateFormatter(timeZone).format(date);
}

/**
 * 日付が有効な形式（YYYY-MM-DD）かチェック
 */
export function isValidDateFormat(dateStr: string): boolean {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(dateStr)) {
    return false;
  }

  const [year, month, day] = dateStr.split('-').map(Number);
  const date = new Date(year, month - 1, day);

  return (
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

/**
 * 日付を YYYYMMDD 形式に変換（ファイル名用）
 */
export function toCompactDate(dateStr: string): string {
  return dateStr.replace(/-/g, '');
}

/**
 * 実行日（YYYYMMDD）を求める
 */
export function getRunDate(now: Date = new Date(), timeZone = 'Europe/Lisbon'): string {
  return toCompactDate(getLocalDate(now, timeZone));
}

/**
 * YYYYMMDD 形式かチェック
 */
export function isCompactDate(value: string): boolean {
  if (!/^\d{8}$/.test(value)) {
    return false;
  }
  return isValidDateFormat(`${value.slice(0, 4)}-${value.slice(4, 6)}-${value.slice(6, 8)}`);
}
