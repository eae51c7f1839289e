import { ExcelTrialReader, normalizeCell } from './excel-trial.reader';
import { TrialReaderError } from '../interfaces/trial-reader.interface';
import { createWorkbookBuffer } from '../../../test/utils/workbook-builder';

describe('ExcelTrialReader', () => {
  let reader: ExcelTrialReader;

  beforeEach(() => {
    reader = new ExcelTrialReader();
  });

  describe('canHandle', () => {
    it('should accept .xlsx files only', () => {
      expect(reader.canHandle('trials.xlsx')).toBe(true);
      expect(reader.canHandle('Trials.XLSX')).toBe(true);
      expect(reader.canHandle('trials.csv')).toBe(false);
    });
  });

  describe('read', () => {
    it('should read the first worksheet', async () => {
      const buffer = await createWorkbookBuffer('Trials', [
        ['Trial', 'Lat', 'Lon', 'Sowing'],
        ['T-01', -15.5, -47.9, new Date(Date.UTC(2023, 2, 1))],
      ]);

      const table = await reader.read(buffer);

      expect(table.headers).toEqual(['Trial', 'Lat', 'Lon', 'Sowing']);
      expect(table.rows).toEqual([
        {
          rowNumber: 1,
          cells: {
            Trial: 'T-01',
            Lat: -15.5,
            Lon: -47.9,
            Sowing: new Date(Date.UTC(2023, 2, 1)),
          },
        },
      ]);
    });

    it('should read a named worksheet', async () => {
      const buffer = await createWorkbookBuffer('Sites', [
        ['Trial'],
        ['T-09'],
      ]);
      const table = await reader.read(buffer, { sheetName: 'Sites' });
      expect(table.rows).toEqual([{ rowNumber: 1, cells: { Trial: 'T-09' } }]);
    });

    it('should fail on a missing worksheet', async () => {
      const buffer = await createWorkbookBuffer('Trials', [['Trial']]);
      await expect(
        reader.read(buffer, { sheetName: 'Other' }),
      ).rejects.toThrow("[excel] Worksheet 'Other' not found");
    });

    it('should reduce formula, rich text and hyperlink cells', async () => {
      const buffer = await createWorkbookBuffer('Trials', [
        ['Trial', 'Country'],
        [{ formula: 'CONCATENATE("T-","02")', result: 'T-02', date1904: false }, 'BR'],
        [{ richText: [{ text: 'T-' }, { text: '03' }] }, 'AR'],
        [{ text: 'T-04', hyperlink: 'https://example.test/t-04' }, 'KE'],
      ]);

      const table = await reader.read(buffer);

      expect(table.rows.map((r) => r.cells.Trial)).toEqual(['T-02', 'T-03', 'T-04']);
    });

    it('should skip rows without values and keep sheet row numbers', async () => {
      const buffer = await createWorkbookBuffer('Trials', [
        ['Trial', 'Country'],
        ['T-01', '  '],
        [null, null],
        ['T-02', 'BR'],
      ]);

      const table = await reader.read(buffer);

      expect(table.rows).toEqual([
        { rowNumber: 1, cells: { Trial: 'T-01', Country: null } },
        { rowNumber: 3, cells: { Trial: 'T-02', Country: 'BR' } },
      ]);
    });

    it('should fail on a buffer that is not a workbook', async () => {
      await expect(
        reader.read(Buffer.from('Trial,Lat\nT-01,1')),
      ).rejects.toThrow(TrialReaderError);
    });
  });

  describe('normalizeCell', () => {
    it('should turn error cells into null', () => {
      expect(normalizeCell({ error: '#N/A' })).toBeNull();
    });

    it('should turn formulas without a cached result into null', () => {
      expect(
        normalizeCell({ formula: 'A1*2', date1904: false }),
      ).toBeNull();
    });

    it('should keep plain values', () => {
      expect(normalizeCell(12)).toBe(12);
      expect(normalizeCell(true)).toBe(true);
      expect(normalizeCell(undefined)).toBeNull();
    });
  });
});
