import { describe, it, expect } from 'vitest';
import { escapeCsvCell, toCsv } from '@/lib/utils/csv';

describe('csv.ts', () => {
  describe('escapeCsvCell', () => {
    it('通常の文字列はそのまま', () => {
      expect(escapeCsvCell('Lisboa')).toBe('Lisboa');
    });

    it('数値は文字列化する', () => {
      expect(escapeCsvCell(12.5)).toBe('12.5');
    });

    it('null / undefined は空セル', () => {
      expect(escapeCsvCell(null)).toBe('');
      expect(escapeCsvCell(undefined)).toBe('');
    });

    it('カンマを含む場合は引用符で囲む', () => {
      expect(escapeCsvCell('Crimes against persons, total')).toBe('"Crimes against persons, total"');
    });

    it('引用符は二重化する', () => {
      expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
    });

    it('改行を含む場合は引用符で囲む', () => {
      expect(escapeCsvCell('line\nbreak')).toBe('"line\nbreak"');
      expect(escapeCsvCell('line\rbreak')).toBe('"line\rbreak"');
    });
  });

  describe('toCsv', () => {
    it('ヘッダーと行を列順に出力し、末尾を改行で終える', () => {
      const csv = toCsv(['a', 'b'], [
        { a: 1, b: 'x' },
        { b: 'y', a: 2 },
      ]);
      expect(csv).toBe('a,b\n1,x\n2,y\n');
    });

    it('行に無い列は空セル', () => {
      expect(toCsv(['a', 'b'], [{ a: null }])).toBe('a,b\n,\n');
    });

    it('行が無ければヘッダーのみ', () => {
      expect(toCsv(['Geo Code', 'Geo'], [])).toBe('Geo Code,Geo\n');
    });
  });
});
