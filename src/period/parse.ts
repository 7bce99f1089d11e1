import {
  DateTime,
  FixedOffsetZone,
  type DateTimeOptions,
  type Zone,
} from "luxon";
import FORMATS from "./formats.json" with { type: "json" };

/** Epoch digits: 10 are seconds, 13 milliseconds, 19 nanoseconds. */
const EPOCH = /^(?:\d{10}|\d{13}|\d{19})$/;
const ZONE_SUFFIX = /\s+([A-Za-z]+)$/;
const AT = /\s+at\s+/i;

/** Offsets in minutes for the zone names accepted after a date. */
const ZONE_ABBREVIATIONS: Record<string, number> = {
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -5 * 60,
  EDT: -4 * 60,
  CST: -6 * 60,
  CDT: -5 * 60,
  MST: -7 * 60,
  MDT: -6 * 60,
  PST: -8 * 60,
  PDT: -7 * 60,
};

function fromEpochDigits(s: string, zone: string): DateTime | null {
  const value = BigInt(s);
  let millis: bigint;
  if (s.length === 10) millis = value * 1000n;
  else if (s.length === 13) millis = value;
  else millis = value / 1_000_000n;
  const dt = DateTime.fromMillis(Number(millis), { zone });
  return dt.isValid ? dt : null;
}

const STANDARD: Array<(s: string, opts: DateTimeOptions) => DateTime> = [
  (s, opts) => DateTime.fromISO(s, opts),
  (s, opts) => DateTime.fromRFC2822(s, opts),
  (s, opts) => DateTime.fromHTTP(s, opts),
  (s, opts) => DateTime.fromSQL(s, opts),
];

/**
 * Parse a date/time written in one of many common shapes and return it in
 * `zone`, or `null` when nothing matches.
 *
 * Input without an explicit offset is read as local time in `zone`. Only
 * digit strings of length 10, 13 or 19 are epoch values; `"20240102"` is a
 * compact ISO date.
 */
export function parseDateTime(input: string, zone: string): DateTime | null {
  const s = input.trim();
  if (!s) return null;
  if (EPOCH.test(s)) return fromEpochDigits(s, zone);

  for (const parse of STANDARD) {
    const dt = parse(s, { zone });
    if (dt.isValid) return dt;
  }

  let text = s.replace(AT, " ");
  let sourceZone: string | Zone = zone;
  const suffix = ZONE_SUFFIX.exec(text);
  const offset = suffix ? ZONE_ABBREVIATIONS[suffix[1].toUpperCase()] : undefined;
  if (suffix && offset !== undefined) {
    text = text.slice(0, suffix.index);
    sourceZone = FixedOffsetZone.instance(offset);
  }

  for (const format of FORMATS) {
    const dt = DateTime.fromFormat(text, format, {
      zone: sourceZone,
      locale: "en-US",
    });
    if (dt.isValid) return dt.setZone(zone);
  }

  return null;
}

/**
 * Read an epoch-seconds number. Non-negative integers of up to ten digits are
 * taken directly, so `0` is the epoch; anything else goes through
 * {@link parseDateTime} as a string.
 */
export function parseTimestamp(seconds: number, zone: string): DateTime | null {
  if (Number.isSafeInteger(seconds) && seconds >= 0 && seconds < 1e10) {
    return DateTime.fromSeconds(seconds, { zone });
  }
  return parseDateTime(String(seconds), zone);
}
