/**
 * 取得対象指標の定義
 *
 * 0008074: Crime rate by Geographic localization and Category of crime (Annual)
 */

export interface IndicatorDefinition {
  /** INE 指標コード（varcd） */
  code: string;
  /** 計算式（出力 CSV の `Formule` 列） */
  formula: string;
  /** 単位（出力 CSV の `Measure Of Unit` 列） */
  unit: string;
  /** データが存在する最初の年 */
  firstYear: number;
  /** 年パラメータ（Dim1）の接頭辞 */
  yearTokenPrefix: string;
  /** API 列名 → 出力列名 */
  columnRenames: Readonly<Record<string, string>>;
  /** 出力から除外する列 */
  droppedColumns: readonly string[];
}

/** 変換時に付与する列名 */
export const DERIVED_COLUMNS = {
  year: 'Year',
  indicatorCode: 'Indicator Code',
  formula: 'Formule',
  unit: 'Measure Of Unit',
} as const;

export const INDICATOR_0008074: IndicatorDefinition = {
  code: '0008074',
  formula: '(Number of crimes/ Resident population)*1000',
  unit: 'Permillage',
  firstYear: 2011,
  yearTokenPrefix: 'S7A',
  columnRenames: {
    geocod: 'Geo Code',
    geodsg: 'Geo',
    dim_3: 'Crime Code',
    dim_3_t: 'Crime',
    valor: 'Value',
  },
  droppedColumns: ['sinal_conv', 'sinal_conv_desc'],
};
