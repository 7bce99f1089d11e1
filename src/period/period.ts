import { DateTime, Info } from "luxon";
import { ParseError, type ParseErrorKind } from "../common/types.js";
import { parseDateTime, parseTimestamp } from "./parse.js";

/** NURE is in Kharkiv; every period is expressed in Ukrainian time. */
export const DEFAULT_ZONE = "Europe/Kyiv";

export interface PeriodOptions {
  /** IANA zone the boundaries are computed in. */
  zone?: string;
  /** Reference instant for relative periods. Defaults to the current time. */
  now?: Date | DateTime;
}

export function resolveZone(zone: string = DEFAULT_ZONE): string {
  if (!Info.isValidIANAZone(zone)) {
    throw new RangeError(`Unknown time zone: ${zone}`);
  }
  return zone;
}

function reference(zone: string, now?: Date | DateTime): DateTime {
  if (now === undefined) return DateTime.now().setZone(zone);
  const dt = now instanceof Date ? DateTime.fromJSDate(now) : now;
  return dt.setZone(zone);
}

function parseOrThrow(
  input: string,
  zone: string,
  kind: ParseErrorKind,
): DateTime {
  const dt = parseDateTime(input, zone);
  if (!dt) throw new ParseError(kind, input);
  return dt;
}

function timestampOrThrow(seconds: number, zone: string): DateTime {
  const dt = parseTimestamp(seconds, zone);
  if (!dt) throw new ParseError("InvalidTimestampProvided", String(seconds));
  return dt;
}

function assertCount(count: number): void {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Count must be a positive integer, got ${count}`);
  }
}

/** Parse any supported date string into epoch seconds. */
export function toTimestamp(input: string, opts?: { zone?: string }): number {
  const zone = resolveZone(opts?.zone);
  return parseOrThrow(input, zone, "InvalidStringProvided").toUnixInteger();
}

export function fromTimestamp(
  seconds: number,
  opts?: { zone?: string },
): DateTime {
  const zone = resolveZone(opts?.zone);
  return timestampOrThrow(seconds, zone);
}

/**
 * A closed interval between two instants in one time zone.
 *
 * `start <= end` is expected but not checked; periods decoded from the API
 * carry whatever the server sent.
 */
export class Period {
  readonly start: DateTime;
  readonly end: DateTime;

  constructor(start: DateTime, end: DateTime) {
    this.start = start;
    this.end = end;
  }

  get startSeconds(): number {
    return this.start.toUnixInteger();
  }

  get endSeconds(): number {
    return this.end.toUnixInteger();
  }

  contains(instant: Date | DateTime): boolean {
    const ms = instant instanceof Date ? instant.getTime() : instant.toMillis();
    return this.start.toMillis() <= ms && ms <= this.end.toMillis();
  }

  toString(): string {
    return `${this.start.toISO()}/${this.end.toISO()}`;
  }

  // --- Explicit bounds ---

  static fromStrings(start: string, end: string, opts?: PeriodOptions): Period {
    const zone = resolveZone(opts?.zone);
    return new Period(
      parseOrThrow(start, zone, "InvalidStringProvided"),
      parseOrThrow(end, zone, "InvalidStringProvided"),
    );
  }

  static fromTimestamps(
    start: number,
    end: number,
    opts?: PeriodOptions,
  ): Period {
    const zone = resolveZone(opts?.zone);
    return new Period(
      timestampOrThrow(start, zone),
      timestampOrThrow(end, zone),
    );
  }

  // --- Days ---

  /** From now until the end of today. */
  static now(opts?: PeriodOptions): Period {
    const now = reference(resolveZone(opts?.zone), opts?.now);
    return new Period(now, now.endOf("day"));
  }

  static today(opts?: PeriodOptions): Period {
    const now = reference(resolveZone(opts?.zone), opts?.now);
    return Period.wholeDays(now, 1);
  }

  static thisDay(opts?: PeriodOptions): Period {
    return Period.today(opts);
  }

  static nextDay(opts?: PeriodOptions): Period {
    const now = reference(resolveZone(opts?.zone), opts?.now);
    return Period.wholeDays(now.plus({ hours: 24 }), 1);
  }

  static dayFrom(date: string, opts?: PeriodOptions): Period {
    const zone = resolveZone(opts?.zone);
    return Period.wholeDays(
      parseOrThrow(date, zone, "InvalidStringProvided"),
      1,
    );
  }

  /** `count` whole days, the first being the day of `date`. */
  static daysFrom(date: string, count: number, opts?: PeriodOptions): Period {
    assertCount(count);
    const zone = resolveZone(opts?.zone);
    return Period.wholeDays(
      parseOrThrow(date, zone, "InvalidStringProvided"),
      count,
    );
  }

  // --- Weeks (ISO, Monday first) ---

  static thisWeek(opts?: PeriodOptions): Period {
    const now = reference(resolveZone(opts?.zone), opts?.now);
    return Period.wholeWeeks(now, 1);
  }

  static nextWeek(opts?: PeriodOptions): Period {
    const now = reference(resolveZone(opts?.zone), opts?.now);
    return Period.wholeWeeks(now.plus({ weeks: 1 }), 1);
  }

  static weekFrom(date: string, opts?: PeriodOptions): Period {
    const zone = resolveZone(opts?.zone);
    return Period.wholeWeeks(
      parseOrThrow(date, zone, "InvalidStringProvided"),
      1,
    );
  }

  /** `count` whole weeks, the first being the week containing `date`. */
  static weeksFrom(date: string, count: number, opts?: PeriodOptions): Period {
    assertCount(count);
    const zone = resolveZone(opts?.zone);
    return Period.wholeWeeks(
      parseOrThrow(date, zone, "InvalidStringProvided"),
      count,
    );
  }

  private static wholeDays(anchor: DateTime, count: number): Period {
    const start = anchor.startOf("day");
    return new Period(start, start.plus({ days: count - 1 }).endOf("day"));
  }

  private static wholeWeeks(anchor: DateTime, count: number): Period {
    const start = anchor.startOf("week");
    return new Period(start, start.plus({ weeks: count - 1 }).endOf("week"));
  }
}
