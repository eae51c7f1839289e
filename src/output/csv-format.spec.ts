import {
  collectColumns,
  dedupeRows,
  escapeCSV,
  formatCsv,
} from './csv-format';

describe('csv format', () => {
  describe('escapeCSV', () => {
    it('should leave plain values alone', () => {
      expect(escapeCSV('Temperature_(Mean)_(°C)')).toBe('Temperature_(Mean)_(°C)');
    });

    it('should quote values with separators, quotes or line breaks', () => {
      expect(escapeCSV('a,b')).toBe('"a,b"');
      expect(escapeCSV('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCSV('two\nlines')).toBe('"two\nlines"');
    });
  });

  describe('collectColumns', () => {
    it('should take the union of keys in first-seen order', () => {
      expect(
        collectColumns([
          { a: 1, b: 2 },
          { b: 3, c: 4 },
        ]),
      ).toEqual(['a', 'b', 'c']);
    });
  });

  describe('dedupeRows', () => {
    it('should keep the first of identical rows', () => {
      const rows = [
        { Trial: 'T-01', v: 1 },
        { Trial: 'T-02', v: 1 },
        { Trial: 'T-01', v: 1 },
      ];
      expect(dedupeRows(rows, ['Trial', 'v'])).toEqual([
        { Trial: 'T-01', v: 1 },
        { Trial: 'T-02', v: 1 },
      ]);
    });

    it('should treat missing and null values alike', () => {
      expect(
        dedupeRows([{ a: 1 }, { a: 1, b: null }], ['a', 'b']),
      ).toHaveLength(1);
    });
  });

  describe('formatCsv', () => {
    it('should write a header, one line per row and a trailing newline', () => {
      expect(
        formatCsv([
          { Trial: 'T-01', 'Temperature_(Mean)_(°C)': 21.5, Error: null },
        ]),
      ).toBe('Trial,Temperature_(Mean)_(°C),Error\nT-01,21.5,\n');
    });

    it('should leave missing values empty', () => {
      expect(formatCsv([{ a: 1 }, { b: 'x,y' }])).toBe('a,b\n1,\n,"x,y"\n');
    });
  });
});
