/**
 * 生データ → 表形式への変換
 *
 * @description 年ごとの観測値配列をフラット化して1つの表に連結し、
 * 定数列の付与・フラグ列の削除・列名の変更を行う。
 * 想定外の形が1年でも含まれていれば TransformError（スキーマ変化は許容しない）。
 */

import { TransformError } from '../errors';
import { DERIVED_COLUMNS, type IndicatorDefinition } from '../ine/indicator-config';
import type { RawMapping } from '../ine/types';
import { createLogger, type LogContext } from '../utils/logger';

export type CleanValue = string | number | boolean | null;
export type CleanRow = Record<string, CleanValue>;

export interface CleanTable {
  /** 出力列（この順で CSV に書き出す） */
  columns: string[];
  rows: CleanRow[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * プロトタイプを持たない行（`constructor` や `__proto__` もただの列名として扱う）
 */
function emptyRow(): CleanRow {
  return Object.create(null);
}

/**
 * ネストしたオブジェクトを `a.b` 形式のキーに展開
 *
 * 配列は JSON 文字列として1セルに収める
 */
export function flattenRecord(record: Record<string, unknown>, prefix = ''): CleanRow {
  const flat = emptyRow();

  for (const [key, value] of Object.entries(record)) {
    const column = prefix ? `${prefix}.${key}` : key;

    if (isPlainObject(value)) {
      for (const [nested, nestedValue] of Object.entries(flattenRecord(value, column))) {
        flat[nested] = nestedValue;
      }
    } else if (Array.isArray(value)) {
      flat[column] = JSON.stringify(value);
    } else if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean' ||
      value === null
    ) {
      flat[column] = value;
    }
    // undefined は列を作らない
  }

  return flat;
}

/**
 * 生データを表に変換
 *
 * @throws {TransformError} 生データが空・年の値が配列でない・要素がオブジェクトでない・必須列が無い
 */
export function transformRawData(
  raw: RawMapping,
  indicator: IndicatorDefinition,
  logContext: LogContext = {}
): CleanTable {
  const logger = createLogger({ module: 'etl/transform', ...logContext });

  if (raw.size === 0) {
    throw new TransformError('Raw data is empty; no year returned data');
  }

  const sourceColumns: string[] = [];
  const seen = new Set<string>();
  const register = (column: string) => {
    if (!seen.has(column)) {
      seen.add(column);
      sourceColumns.push(column);
    }
  };

  const sourceRows: CleanRow[] = [];

  for (const [year, records] of raw) {
    logger.debug('Transforming year', { year });

    if (!Array.isArray(records)) {
      throw new TransformError(`Records for year ${year} are not an array`, year);
    }

    for (const [index, record] of records.entries()) {
      if (!isPlainObject(record)) {
        throw new TransformError(`Record ${index} for year ${year} is not an object`, year);
      }

      const row = flattenRecord(record);
      for (const column of Object.keys(row)) {
        register(column);
      }
      row[DERIVED_COLUMNS.year] = year;

      sourceRows.push(row);
    }

    // 年内の全レコードの列を揃えてから Year を置く
    register(DERIVED_COLUMNS.year);
  }

  const missingColumns = Object.keys(indicator.columnRenames).filter((column) => !seen.has(column));
  if (missingColumns.length > 0) {
    throw new TransformError(`Missing expected columns: ${missingColumns.join(', ')}`);
  }

  const dropped = new Set(indicator.droppedColumns);
  const keptColumns = sourceColumns.filter((column) => !dropped.has(column));

  const constants: CleanRow = {
    [DERIVED_COLUMNS.indicatorCode]: indicator.code,
    [DERIVED_COLUMNS.formula]: indicator.formula,
    [DERIVED_COLUMNS.unit]: indicator.unit,
  };

  const renames = new Map(Object.entries(indicator.columnRenames));
  const renamed = (column: string) => renames.get(column) ?? column;
  const renamedKept = keptColumns.map(renamed);
  const columns = [
    ...renamedKept,
    ...Object.keys(constants).filter((column) => !renamedKept.includes(column)),
  ];

  const rows = sourceRows.map((source) => {
    const row = emptyRow();
    for (const column of keptColumns) {
      row[renamed(column)] = source[column] ?? null;
    }
    for (const [column, value] of Object.entries(constants)) {
      row[column] = value;
    }
    return row;
  });

  logger.info('Raw data transformed', {
    years: raw.size,
    rowCount: rows.length,
    columns,
  });

  return { columns, rows };
}
