/**
 * 年パラメータ（Dim1）の生成
 *
 * `S7A2011` = 「2011年」を表す INE の期間トークン
 */

/**
 * 年 → トークン
 */
export function toYearToken(year: number, prefix = 'S7A'): string {
  return `${prefix}${year}`;
}

/**
 * トークン → 年（末尾4桁）
 */
export function yearFromToken(token: string): string {
  return token.slice(-4);
}

/**
 * firstYear から lastYear まで（両端含む）のトークンを昇順で生成
 *
 * @throws {RangeError} 年が整数でない、または lastYear < firstYear
 */
export function buildYearParameters(firstYear: number, lastYear: number, prefix = 'S7A'): string[] {
  if (!Number.isInteger(firstYear) || !Number.isInteger(lastYear)) {
    throw new RangeError(`Years must be integers: ${firstYear}..${lastYear}`);
  }
  if (lastYear < firstYear) {
    throw new RangeError(`Last year ${lastYear} is before first year ${firstYear}`);
  }

  const tokens: string[] = [];
  for (let year = firstYear; year <= lastYear; year++) {
    tokens.push(toYearToken(year, prefix));
  }
  return tokens;
}
