import {
  calendarDateFromDate,
  defaultFuzzyDateParser,
  type CalendarDate,
  type FuzzyDateParser,
} from './fuzzy-date.js';

const RANGE_SEPARATOR_RE = /\s*(?:--|[-–—|])\s*/;
const PRESENT_RE = /present|current/i;

export interface DurationOptions {
  enabled: boolean;
  /** `null` when no fuzzy date parsing is available; durations are then skipped. */
  dateParser?: FuzzyDateParser | null;
  /** Clock used for "Present" / "Current" end dates. */
  now?: () => Date;
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

export function formatDuration(years: number, months: number): string {
  const parts: string[] = [];
  if (years > 0) parts.push(plural(years, 'year'));
  if (months > 0) parts.push(plural(months, 'month'));
  if (parts.length === 0) return '(less than 1 month)';
  return `(${parts.join(' ')})`;
}

export class DurationCalculator {
  private readonly enabled: boolean;
  private readonly dateParser: FuzzyDateParser | null;
  private readonly now: () => Date;

  constructor(options: DurationOptions) {
    this.enabled = options.enabled;
    this.dateParser = options.dateParser === undefined ? defaultFuzzyDateParser : options.dateParser;
    this.now = options.now ?? (() => new Date());
  }

  canComputeDurations(): boolean {
    return this.enabled && this.dateParser !== null;
  }

  /**
   * "June 2018 - September 2021" → "(3 years 3 months)". Returns an empty
   * string whenever the range cannot be measured.
   */
  computeDuration(dateRange: string): string {
    const parser = this.dateParser;
    if (!this.enabled || parser === null) return '';

    try {
      const parts = dateRange.split(RANGE_SEPARATOR_RE);
      if (parts.length !== 2) return '';
      const [startText, endText] = parts;

      const reference = this.now();
      let start: CalendarDate;
      let end: CalendarDate;
      try {
        start = parser.parse(startText, reference);
      } catch {
        return '';
      }

      if (PRESENT_RE.test(endText)) {
        end = calendarDateFromDate(reference);
      } else {
        try {
          end = parser.parse(endText, reference);
        } catch {
          return '';
        }
      }

      const delta = parser.difference(start, end);
      // A reversed range is unmeasurable, not "less than 1 month".
      if (delta.totalMonths < 0) return '';
      return formatDuration(delta.years, delta.months);
    } catch {
      return '';
    }
  }
}
