/**
 * CSV シリアライズ
 *
 * @description ヘッダー + 行、インデックス列なし、区切り `,`、改行 `\n`
 */

export type CsvCell = string | number | boolean | null | undefined;

/**
 * 1セルをエスケープ
 *
 * 区切り文字・引用符・改行を含む場合のみ `"` で囲み、内部の `"` は二重化する
 */
export function escapeCsvCell(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function toCsvLine(cells: CsvCell[]): string {
  return cells.map(escapeCsvCell).join(',');
}

/**
 * 列順に従って CSV 文字列を生成
 *
 * 行に存在しない列は空セルになる。末尾は改行で終わる。
 */
export function toCsv(columns: readonly string[], rows: ReadonlyArray<Record<string, CsvCell>>): string {
  const lines = [toCsvLine([...columns])];
  for (const row of rows) {
    lines.push(toCsvLine(columns.map((column) => row[column])));
  }
  return lines.join('\n') + '\n';
}
