/**
 * ine/client.ts のユニットテスト
 */

import { describe, it, expect } from 'vitest';
import { IneClient, createIneClient } from '@/lib/ine/client';
import { ResponseShapeError } from '@/lib/errors';
import { HttpStatusError, TransportError } from '@/lib/utils/http';
import {
  createIneFetchStub,
  createStalledBodyFetch,
  indicatorBody,
  jsonResponse,
  observation,
} from '../helpers/ine-fixtures';

const BASE = 'https://www.ine.pt/ine/json_indicador/pindica.jsp';

describe('ine/client.ts', () => {
  describe('buildUrl', () => {
    it('varcd / lang / op / Dim1 の順でクエリを組み立てる', () => {
      const client = new IneClient({ indicatorCode: '0008074' });

      expect(client.buildUrl('S7A2011')).toBe(
        `${BASE}?varcd=0008074&lang=EN&op=2&Dim1=S7A2011`
      );
    });

    it('ベースURLと言語を差し替えられる', () => {
      const client = createIneClient({
        indicatorCode: '0008074',
        baseUrl: 'https://mirror.example.test/pindica.jsp',
        lang: 'PT',
      });

      expect(client.buildUrl('S7A2012')).toBe(
        'https://mirror.example.test/pindica.jsp?varcd=0008074&lang=PT&op=2&Dim1=S7A2012'
      );
    });
  });

  describe('getLastAvailableYear', () => {
    it('UltimoPref を数値で返す', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2011: () => jsonResponse(indicatorBody('2022', {})),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getLastAvailableYear('S7A2011')).resolves.toBe(2022);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(fetchImpl.mock.calls[0][0]).toBe(`${BASE}?varcd=0008074&lang=EN&op=2&Dim1=S7A2011`);
    });

    it('数値の UltimoPref も受け付ける', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2011: () => jsonResponse(indicatorBody(2021, {})),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getLastAvailableYear('S7A2011')).resolves.toBe(2021);
    });

    it('UltimoPref が無ければ ResponseShapeError', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2011: () => jsonResponse([{ IndicadorCod: '0008074' }]),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getLastAvailableYear('S7A2011')).rejects.toThrow(
        'Response for S7A2011 has no UltimoPref field'
      );
    });

    it('空配列は ResponseShapeError', async () => {
      const fetchImpl = createIneFetchStub({ S7A2011: () => jsonResponse([]) });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getLastAvailableYear('S7A2011')).rejects.toBeInstanceOf(ResponseShapeError);
    });

    it('4桁の年でなければ ResponseShapeError', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2011: () => jsonResponse(indicatorBody('Ano 2022', {})),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getLastAvailableYear('S7A2011')).rejects.toThrow(
        'UltimoPref is not a year: "Ano 2022"'
      );
    });

    it('JSON でない本文は ResponseShapeError', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2011: () => new Response('<html>maintenance</html>', { status: 200 }),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getLastAvailableYear('S7A2011')).rejects.toThrow(
        'Response for S7A2011 is not valid JSON'
      );
    });
  });

  describe('getYearData', () => {
    it('先頭要素の Dados を返す', async () => {
      const dados = { '2015': [observation({ valor: '28.9' })] };
      const fetchImpl = createIneFetchStub({
        S7A2015: () => jsonResponse(indicatorBody('2022', dados)),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getYearData('S7A2015')).resolves.toEqual(dados);
    });

    it('Dados が無ければ ResponseShapeError', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2015: () => jsonResponse([{ UltimoPref: '2022' }]),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getYearData('S7A2015')).rejects.toThrow(
        'Response for S7A2015 has no Dados object'
      );
    });

    it('Dados が配列なら ResponseShapeError', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2015: () => jsonResponse([{ Dados: [observation()] }]),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      await expect(client.getYearData('S7A2015')).rejects.toBeInstanceOf(ResponseShapeError);
    });

    it('HTTP エラーはそのまま HttpStatusError', async () => {
      const fetchImpl = createIneFetchStub({
        S7A2015: () => jsonResponse({}, 500, 'Internal Server Error'),
      });
      const client = new IneClient({ indicatorCode: '0008074', fetchImpl });

      const promise = client.getYearData('S7A2015');
      await expect(promise).rejects.toBeInstanceOf(HttpStatusError);
      await expect(promise).rejects.toMatchObject({ statusCode: 500 });
    });

    it('本文の読み込み中のタイムアウトは ResponseShapeError ではなく TransportError', async () => {
      const client = new IneClient({
        indicatorCode: '0008074',
        timeoutMs: 20,
        fetchImpl: createStalledBodyFetch(),
      });

      const promise = client.getYearData('S7A2011');

      await expect(promise).rejects.toBeInstanceOf(TransportError);
      await expect(promise).rejects.toThrow('Response body timed out after 20ms');
    });
  });
});
