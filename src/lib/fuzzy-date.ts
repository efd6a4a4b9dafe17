export interface CalendarDate {
  year: number;
  /** 1–12 */
  month: number;
  day?: number;
}

export interface MonthDifference {
  years: number;
  months: number;
  totalMonths: number;
}

/** Parses free text to a calendar date and measures year/month gaps between dates. */
export interface FuzzyDateParser {
  parse(text: string, reference: Date): CalendarDate;
  difference(start: CalendarDate, end: CalendarDate): MonthDifference;
}

export class FuzzyDateError extends Error {
  constructor(readonly input: string) {
    super(`Could not find a date in '${input}'`);
    this.name = 'FuzzyDateError';
  }
}

const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12,
};

const ISO_RE = /\b(\d{4})-(\d{1,2})(?:-(\d{1,2}))?\b/;
const US_FULL_RE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/;
const MONTH_YEAR_RE = /\b(\d{1,2})\/(\d{4})\b/;
const TOKEN_RE = /\p{L}+|\d+/gu;

export function monthTokenToNumber(raw: string): number | null {
  return MONTHS[raw.toLowerCase()] ?? null;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function checked(input: string, date: CalendarDate): CalendarDate {
  if (date.month < 1 || date.month > 12) throw new FuzzyDateError(input);
  if (date.day !== undefined && (date.day < 1 || date.day > daysInMonth(date.year, date.month))) {
    throw new FuzzyDateError(input);
  }
  return date;
}

export function calendarDateFromDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

/**
 * Finds a date in loosely written text ("Dec. 2023", "Started June 5, 2018",
 * "03/2021", "2019-07"). Unknown words are ignored; a missing year or month is
 * taken from `reference`. Throws FuzzyDateError when neither is present.
 */
export function parseFuzzyDate(text: string, reference: Date = new Date()): CalendarDate {
  const iso = ISO_RE.exec(text);
  if (iso) {
    return checked(text, {
      year: Number(iso[1]),
      month: Number(iso[2]),
      ...(iso[3] !== undefined ? { day: Number(iso[3]) } : {}),
    });
  }

  const usFull = US_FULL_RE.exec(text);
  if (usFull) {
    return checked(text, { year: Number(usFull[3]), month: Number(usFull[1]), day: Number(usFull[2]) });
  }

  const monthYear = MONTH_YEAR_RE.exec(text);
  if (monthYear) {
    return checked(text, { year: Number(monthYear[2]), month: Number(monthYear[1]) });
  }

  let year: number | undefined;
  let month: number | undefined;
  let day: number | undefined;

  for (const token of text.match(TOKEN_RE) ?? []) {
    if (/^\d+$/.test(token)) {
      const value = Number(token);
      if (token.length === 4 && year === undefined) {
        year = value;
      } else if (token.length <= 2 && value >= 1 && value <= 31 && day === undefined) {
        day = value;
      }
      continue;
    }
    const monthNumber = monthTokenToNumber(token);
    if (monthNumber !== null && month === undefined) month = monthNumber;
  }

  if (year === undefined && month === undefined) throw new FuzzyDateError(text);

  return checked(text, {
    year: year ?? reference.getFullYear(),
    month: month ?? reference.getMonth() + 1,
    // A bare number is only a day when it sits next to a month name.
    ...(day !== undefined && month !== undefined ? { day } : {}),
  });
}

/**
 * Whole years and remaining months from `start` to `end`. A month is only
 * discounted for an incomplete day count when both dates carry a day.
 */
export function monthDifference(start: CalendarDate, end: CalendarDate): MonthDifference {
  let totalMonths = (end.year * 12 + end.month) - (start.year * 12 + start.month);
  if (start.day !== undefined && end.day !== undefined && end.day < start.day) {
    totalMonths -= 1;
  }
  return {
    years: Math.trunc(totalMonths / 12),
    months: totalMonths % 12,
    totalMonths,
  };
}

export const defaultFuzzyDateParser: FuzzyDateParser = {
  parse: parseFuzzyDate,
  difference: monthDifference,
};
