const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** A date without a time of day. Months are 1-based. */
export class CalendarDate {
  constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number
  ) {}

  static fromDate(date: Date): CalendarDate {
    return new CalendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
  }

  toDate(): Date {
    return new Date(this.year, this.month - 1, this.day);
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  const millis = date.getMilliseconds();
  return millis ? `${day} ${time}.${pad(millis, 3)}` : `${day} ${time}`;
}
