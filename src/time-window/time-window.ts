import { addDays, format } from 'date-fns';
import { InputValidationError } from '../common/errors';
import { TrialRecord } from '../trials/trial.types';
import { DEFAULT_DATE_FORMATS, parseCalendarDate } from './date-parsing';

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Signed day offsets applied to the earliest and latest date of interest
 */
export interface DayOffsets {
  startDays: number;
  endDays: number;
}

/**
 * Request window as calendar dates (yyyy-MM-dd).
 * `startDate <= endDate` is not guaranteed here; the transport checks it.
 */
export interface TimeWindow {
  startDate: string;
  endDate: string;
}

/**
 * Force the window to cover every date of interest: a positive start offset
 * or a negative end offset becomes 0, reported through `warn`.
 */
export function clampOffsets(
  offsets: DayOffsets,
  warn: (message: string) => void,
): DayOffsets {
  let { startDays, endDays } = offsets;

  if (startDays > 0) {
    warn(
      `Start date offset must not be positive, using 0 instead of ${startDays}`,
    );
    startDays = 0;
  }
  if (endDays < 0) {
    warn(`End date offset must not be negative, using 0 instead of ${endDays}`);
    endDays = 0;
  }

  return { startDays, endDays };
}

/**
 * min(dates) + startDays .. max(dates) + endDays, as calendar dates
 */
export function deriveTimeWindow(
  dates: readonly Date[],
  offsets: DayOffsets,
): TimeWindow {
  if (dates.length === 0) {
    throw new InputValidationError('No dates of interest to derive a window');
  }

  const times = dates.map((d) => d.getTime());
  const earliest = new Date(Math.min(...times));
  const latest = new Date(Math.max(...times));

  return {
    startDate: format(addDays(earliest, offsets.startDays), CALENDAR_DATE_FORMAT),
    endDate: format(addDays(latest, offsets.endDays), CALENDAR_DATE_FORMAT),
  };
}

/**
 * Parse a record's date columns and derive its window.
 *
 * @throws InputValidationError naming the first empty or unparseable column
 */
export function deriveRecordWindow(
  record: TrialRecord,
  dateColumns: readonly string[],
  offsets: DayOffsets,
  formats: readonly string[] = DEFAULT_DATE_FORMATS,
): TimeWindow {
  const dates: Date[] = [];

  for (const column of dateColumns) {
    const value = record.dates[column] ?? null;
    const parsed = parseCalendarDate(value, formats);
    if (!parsed) {
      throw new InputValidationError(
        `Unparseable date in column '${column}': '${value === null ? '' : String(value)}'`,
        record.rowNumber,
      );
    }
    dates.push(parsed);
  }

  return deriveTimeWindow(dates, offsets);
}
