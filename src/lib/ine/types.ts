/**
 * INE (Statistics Portugal) 指標 API レスポンス型定義
 *
 * @description `pindica.jsp` の JSON レスポンス（op=2）
 * @see https://www.ine.pt/xportal/xmain?xpid=INE&xpgid=ine_api
 */

/**
 * `Dados`: 年ラベル → その年の観測値
 *
 * 年ごとの値は配列であることを期待するが、検証は変換時に行うため unknown のまま保持する
 */
export type IneDados = Record<string, unknown>;

/**
 * 全年分をマージした生データ（挿入順 = 取得順）
 */
export type RawMapping = Map<string, unknown>;
