// MARK: - Journal Calendar
// Maps instants to journal dates and daily boundaries in the configured zone

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export interface ResetTime {
  hour: number;
  minute: number;
}

export interface Boundary {
  /** Journal date closed by this boundary */
  date: string;
  at: Date;
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export function parseResetTime(value: string): ResetTime | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return null;
  }

  return { hour, minute };
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function parseDate(date: string): { year: number; month: number; day: number } {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new RangeError(`Invalid journal date: ${date}`);
  }

  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

function formatDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function addDays(date: string, days: number): string {
  const { year, month, day } = parseDate(date);
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * ONE_DAY_MS);
  return formatDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

export class JournalCalendar {
  readonly timezone: string;
  readonly resetTime: ResetTime;
  private readonly formatter: Intl.DateTimeFormat;

  constructor(timezone: string, resetTime: ResetTime = { hour: 0, minute: 0 }) {
    if (!isValidTimezone(timezone)) {
      throw new RangeError(`Unknown time zone: ${timezone}`);
    }

    this.timezone = timezone;
    this.resetTime = resetTime;
    this.formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
  }

  /**
   * Journal date of an instant. Local times before the reset time
   * still belong to the previous day.
   */
  dateOf(instant: Date): string {
    const parts = this.zonedParts(instant);
    const date = formatDate(parts.year, parts.month, parts.day);
    const minutes = parts.hour * 60 + parts.minute;
    const resetMinutes = this.resetTime.hour * 60 + this.resetTime.minute;

    return minutes < resetMinutes ? addDays(date, -1) : date;
  }

  /**
   * Instant at which the given journal date closes
   */
  boundaryOf(date: string): Date {
    const next = parseDate(addDays(date, 1));
    return this.zonedTimeToUtc(next.year, next.month, next.day, this.resetTime.hour, this.resetTime.minute);
  }

  hasBoundaryPassed(date: string, now: Date): boolean {
    return now.getTime() >= this.boundaryOf(date).getTime();
  }

  /**
   * Most recent boundary at or before now
   */
  latestBoundary(now: Date): Boundary {
    const closedDate = addDays(this.dateOf(now), -1);
    return { date: closedDate, at: this.boundaryOf(closedDate) };
  }

  cronExpression(): string {
    return `${this.resetTime.minute} ${this.resetTime.hour} * * *`;
  }

  private zonedParts(instant: Date): ZonedParts {
    const values: Record<string, number> = {};
    for (const part of this.formatter.formatToParts(instant)) {
      if (part.type !== 'literal') {
        values[part.type] = Number(part.value);
      }
    }

    return {
      year: values.year,
      month: values.month,
      day: values.day,
      hour: values.hour === 24 ? 0 : values.hour,
      minute: values.minute,
      second: values.second,
    };
  }

  private offsetMs(instant: number): number {
    const parts = this.zonedParts(new Date(instant));
    const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
    return asUtc - (instant - (instant % 1000));
  }

  private zonedTimeToUtc(year: number, month: number, day: number, hour: number, minute: number): Date {
    const guess = Date.UTC(year, month - 1, day, hour, minute);
    const firstOffset = this.offsetMs(guess);
    let instant = guess - firstOffset;
    const secondOffset = this.offsetMs(instant);

    if (secondOffset !== firstOffset) {
      instant = guess - secondOffset;
    }

    return new Date(instant);
  }
}
