import { isValid, parse, startOfDay } from 'date-fns';
import { CellValue } from '../trials/trial.types';

/**
 * Accepted date layouts, tried in order. Day-first layouts come before
 * month-first ones; configure a different order for month-first inputs.
 */
export const DEFAULT_DATE_FORMATS: readonly string[] = [
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'dd/MM/yyyy',
  'dd.MM.yyyy',
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
];

/**
 * Parse a table cell into a local calendar date (midnight), or null.
 *
 * Spreadsheet dates arrive as Date objects holding the calendar day in UTC.
 */
export function parseCalendarDate(
  value: CellValue,
  formats: readonly string[] = DEFAULT_DATE_FORMATS,
): Date | null {
  if (value instanceof Date) {
    if (!isValid(value)) return null;
    return new Date(
      value.getUTCFullYear(),
      value.getUTCMonth(),
      value.getUTCDate(),
    );
  }

  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (!text) return null;

  const referenceDate = new Date(2000, 0, 1);
  for (const format of formats) {
    const parsed = parse(text, format, referenceDate);
    if (isValid(parsed)) {
      return startOfDay(parsed);
    }
  }
  return null;
}
