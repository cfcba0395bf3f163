const DAY_MS = 24 * 60 * 60 * 1000;

/** Days a year-less date may lie ahead of the reference before it is read as last year's. */
const FUTURE_TOLERANCE_DAYS = 30;

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

interface CalendarDay {
  readonly year: number;
  /** 0-based, as in `Date.UTC`. */
  readonly month: number;
  readonly day: number;
}

type RelativeUnit = 'day' | 'week' | 'month' | 'year';

const SHORTHAND_PATTERN = /^(\d+)\s*(mo|yr|d|w|m|y|h)$/;
const AGO_PATTERN = /(\d+)\s*(day|week|month|year)s?\s*ago\b/;
const CLOCK_AGO_PATTERN = /\b(?:hours?|hrs?|minutes?|mins?|seconds?|secs?)\s*ago\b/;
const ISO_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const SLASH_PATTERN = /^(\d{1,2})\/(\d{1,2})(?:\/(\d{4}|\d{2}))?$/;
const MONTH_NAME_PATTERN = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?(?:,?\s+(\d{4}))?$/;
const DAY_MONTH_YEAR_PATTERN = /^(\d{1,2})-([a-z]+)-(\d{4})$/;

function daysInMonth(year: number, month: number): number {
  return toDate({ year, month: month + 1, day: 0 }).getUTCDate();
}

function dayOf(date: Date): CalendarDay {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth(), day: date.getUTCDate() };
}

/**
 * UTC midnight of a day; out-of-range months and days roll over.
 * `setUTCFullYear` is used because `Date.UTC` maps years 0-99 onto 1900-1999.
 */
function toDate({ year, month, day }: CalendarDay): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  return date;
}

function validDay(year: number, month: number, day: number): CalendarDay | undefined {
  if (!Number.isInteger(year) || month < 0 || month > 11 || day < 1) {
    return undefined;
  }
  if (day > daysInMonth(year, month)) {
    return undefined;
  }
  return { year, month, day };
}

function monthIndex(name: string): number | undefined {
  const lowered = name.toLowerCase();
  if (lowered === 'sept') {
    return 8;
  }
  const index = MONTH_NAMES.findIndex((full) => full === lowered || (lowered.length === 3 && full.startsWith(lowered)));
  return index === -1 ? undefined : index;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function formatDay({ year, month, day }: CalendarDay): string {
  return `${pad(year, 4)}-${pad(month + 1, 2)}-${pad(day, 2)}`;
}

/** Calendar day of an instant in the process's local time zone. */
function localDayOf(date: Date): CalendarDay | undefined {
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }
  return { year: date.getFullYear(), month: date.getMonth(), day: date.getDate() };
}

function parseReference(input: Date | string): CalendarDay | undefined {
  if (input instanceof Date) {
    return localDayOf(input);
  }

  const iso = ISO_PATTERN.exec(input.trim());
  if (iso) {
    return validDay(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
  }

  return localDayOf(new Date(input));
}

/**
 * Turns human-written posting dates ("3 days ago", "2mo", "Dec 27",
 * "12/27/24") into ISO `yyyy-MM-dd` strings relative to a fixed reference day.
 *
 * The reference is the local calendar day of the given instant; from there
 * all arithmetic is done on calendar days, independent of the time zone.
 * Instances are immutable and can be shared freely.
 */
export class DateNormalizer {
  private readonly reference: CalendarDay;

  /**
   * @param referenceDate - the "today" relative expressions are measured from;
   *   a `yyyy-MM-dd` string is read as that calendar day, any other value
   *   as the local calendar day of its instant.
   * @throws RangeError when the reference cannot be read as a date.
   */
  constructor(referenceDate: Date | string = new Date()) {
    const reference = parseReference(referenceDate);
    if (!reference) {
      throw new RangeError(`Invalid reference date: ${String(referenceDate)}`);
    }
    this.reference = Object.freeze(reference);
    Object.freeze(this);
  }

  /** UTC midnight of the reference day. */
  get referenceDate(): Date {
    return toDate(this.reference);
  }

  /** The reference day as `yyyy-MM-dd`. */
  get referenceDay(): string {
    return formatDay(this.reference);
  }

  normalize(text: string): string | undefined {
    const day = this.resolve(text);
    return day ? formatDay(day) : undefined;
  }

  /**
   * Same as {@link normalize} but returns UTC midnight of the resolved day.
   */
  parse(text: string): Date | undefined {
    const day = this.resolve(text);
    return day ? toDate(day) : undefined;
  }

  private resolve(text: string): CalendarDay | undefined {
    if (typeof text !== 'string') {
      return undefined;
    }

    const input = text.trim().replace(/\s+/g, ' ').toLowerCase();
    if (!input) {
      return undefined;
    }

    return this.resolveRelative(input) ?? this.resolveFixed(input);
  }

  private resolveRelative(input: string): CalendarDay | undefined {
    switch (input) {
      case 'today':
      case 'now':
      case 'just now':
        return this.reference;
      case 'yesterday':
        return this.subtract(1, 'day');
      case 'last week':
        return this.subtract(1, 'week');
      case 'last month':
        return this.subtract(1, 'month');
    }

    const shorthand = SHORTHAND_PATTERN.exec(input);
    if (shorthand) {
      const amount = Number(shorthand[1]);
      switch (shorthand[2]) {
        case 'd':
          return this.subtract(amount, 'day');
        case 'w':
          return this.subtract(amount, 'week');
        case 'mo':
          return this.subtract(amount, 'month');
        case 'm':
          // 0m reads as minutes rather than months
          return amount > 0 ? this.subtract(amount, 'month') : undefined;
        case 'y':
        case 'yr':
          return this.subtract(amount, 'year');
        case 'h':
          return this.reference;
      }
    }

    const ago = AGO_PATTERN.exec(input);
    if (ago) {
      const unit = ago[2];
      if (unit === 'day' || unit === 'week' || unit === 'month' || unit === 'year') {
        return this.subtract(Number(ago[1]), unit);
      }
    }

    if (CLOCK_AGO_PATTERN.test(input)) {
      return this.reference;
    }

    return undefined;
  }

  private resolveFixed(input: string): CalendarDay | undefined {
    const named = MONTH_NAME_PATTERN.exec(input);
    if (named) {
      const month = monthIndex(named[1] ?? '');
      if (month === undefined) return undefined;
      const day = Number(named[2]);
      return named[3] ? validDay(Number(named[3]), month, day) : this.withoutYear(month, day);
    }

    const slash = SLASH_PATTERN.exec(input);
    if (slash) {
      const month = Number(slash[1]) - 1;
      const day = Number(slash[2]);
      const year = slash[3];
      if (year === undefined) return this.withoutYear(month, day);
      return validDay(year.length === 2 ? 2000 + Number(year) : Number(year), month, day);
    }

    const iso = ISO_PATTERN.exec(input);
    if (iso) {
      return validDay(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
    }

    const dayMonthYear = DAY_MONTH_YEAR_PATTERN.exec(input);
    if (dayMonthYear) {
      const month = monthIndex(dayMonthYear[2] ?? '');
      if (month === undefined) return undefined;
      return validDay(Number(dayMonthYear[3]), month, Number(dayMonthYear[1]));
    }

    return undefined;
  }

  /**
   * Year-less dates take the reference year, or the year before when that
   * would put them more than a month past the reference.
   */
  private withoutYear(month: number, day: number): CalendarDay | undefined {
    const { year } = this.reference;
    const sameYear = validDay(year, month, day);
    if (sameYear) {
      const ahead = (toDate(sameYear).getTime() - toDate(this.reference).getTime()) / DAY_MS;
      return ahead > FUTURE_TOLERANCE_DAYS ? validDay(year - 1, month, day) : sameYear;
    }
    return validDay(year - 1, month, day);
  }

  private subtract(amount: number, unit: RelativeUnit): CalendarDay | undefined {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      return undefined;
    }

    const { year, month, day } = this.reference;
    let result: Date;

    if (unit === 'day' || unit === 'week') {
      result = toDate({ year, month, day: day - amount * (unit === 'week' ? 7 : 1) });
    } else {
      const months = amount * (unit === 'year' ? 12 : 1);
      const firstOfTarget = toDate({ year, month: month - months, day: 1 });
      const targetYear = firstOfTarget.getUTCFullYear();
      const targetMonth = firstOfTarget.getUTCMonth();
      // Mar 31 minus one month is Feb 28/29
      result = toDate({
        year: targetYear,
        month: targetMonth,
        day: Math.min(day, daysInMonth(targetYear, targetMonth)),
      });
    }

    return Number.isNaN(result.getTime()) ? undefined : dayOf(result);
  }
}
