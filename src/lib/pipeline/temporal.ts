/**
 * Date normalization
 * Turns the free-form date strings found in feeds and listings into absolute instants
 *
 * Order of attempts:
 * 1. "<date-time> Z|UTC|GMT" with no other zone is read as UTC
 * 2. Whole-string formats (RFC 822, ISO 8601, "YYYY-MM-DD HH:MM", date-only, dotted dates)
 * 3. Zone-less matches take the local offset (KST unless configured otherwise)
 * 4. Last resort: first embedded YYYY.MM.DD / YYYY-MM-DD / YYYY/MM/DD, optional HH:MM
 * Anything else is null. Callers never substitute "now".
 */

export const KST_OFFSET_MINUTES = 9 * 60;

interface DateFields {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

interface PatternMatch {
  fields: DateFields;
  zone?: string; // Absent when the string carried no zone
}

interface DatePattern {
  name: string;
  regex: RegExp;
  extract: (match: RegExpMatchArray) => PatternMatch | null;
}

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

// Offsets in minutes east of UTC
const NAMED_ZONES: Record<string, number> = {
  z: 0,
  ut: 0,
  utc: 0,
  gmt: 0,
  kst: 540,
  jst: 540,
  est: -300,
  edt: -240,
  cst: -360,
  cdt: -300,
  mst: -420,
  mdt: -360,
  pst: -480,
  pdt: -420,
};

const UTC_MARKER = /^(.*\d)\s*(?:Z|UTC|GMT)$/i;

const FALLBACK =
  /(\d{4})[.\/-]\s?(\d{1,2})[.\/-]\s?(\d{1,2})(?!\d)(?:\.?\s*(\d{1,2}):(\d{2})(?!\d))?/;

function num(value: string | undefined, fallback = 0): number {
  return value === undefined || value === "" ? fallback : parseInt(value, 10);
}

function millis(fraction: string | undefined): number {
  if (!fraction) return 0;
  return parseInt(fraction.slice(0, 3).padEnd(3, "0"), 10);
}

function fields(
  year: string,
  month: string | number,
  day: string,
  hour?: string,
  minute?: string,
  second?: string,
  fraction?: string
): DateFields {
  return {
    year: num(year),
    month: typeof month === "number" ? month : num(month),
    day: num(day),
    hour: num(hour),
    minute: num(minute),
    second: num(second),
    millisecond: millis(fraction),
  };
}

const PATTERNS: DatePattern[] = [
  {
    // Wed, 01 May 2024 10:30:45 +0900 / ... GMT / ... KST
    name: "rfc822",
    regex:
      /^(?:[A-Za-z]{3,9},?\s+)?(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+([+-]\d{4}|[A-Za-z]{1,5}))?$/,
    extract: (m) => {
      const month = MONTHS[m[2].toLowerCase()];
      if (month === undefined) return null;
      const zone = m[7];
      if (zone !== undefined && parseZone(zone) === null) return null;
      return { fields: fields(m[3], month, m[1], m[4], m[5], m[6]), zone };
    },
  },
  {
    // 2024-05-01T10:30:45.123+09:00
    name: "iso8601",
    regex:
      /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/i,
    extract: (m) => ({ fields: fields(m[1], m[2], m[3], m[4], m[5], m[6], m[7]), zone: m[8] }),
  },
  {
    // 2024-05-01 10:30:45
    name: "space-separated",
    regex:
      /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(?:\s*([+-]\d{2}:?\d{2}))?$/,
    extract: (m) => ({ fields: fields(m[1], m[2], m[3], m[4], m[5], m[6], m[7]), zone: m[8] }),
  },
  {
    name: "date-only",
    regex: /^(\d{4})-(\d{2})-(\d{2})$/,
    extract: (m) => ({ fields: fields(m[1], m[2], m[3]) }),
  },
  {
    // 2024.05.01 or 2024. 5. 1.
    name: "dot-date",
    regex: /^(\d{4})\.\s?(\d{1,2})\.\s?(\d{1,2})\.?$/,
    extract: (m) => ({ fields: fields(m[1], m[2], m[3]) }),
  },
  {
    name: "dot-date-time",
    regex: /^(\d{4})\.\s?(\d{1,2})\.\s?(\d{1,2})\.?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?$/,
    extract: (m) => ({ fields: fields(m[1], m[2], m[3], m[4], m[5], m[6]) }),
  },
];

/**
 * Offset in minutes east of UTC for a numeric or named zone, null if unknown
 */
export function parseZone(zone: string): number | null {
  const numeric = zone.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (numeric) {
    const hours = parseInt(numeric[2], 10);
    const minutes = parseInt(numeric[3], 10);
    if (hours > 23 || minutes > 59) return null;
    const sign = numeric[1] === "-" ? -1 : 1;
    return sign * (hours * 60 + minutes);
  }
  return NAMED_ZONES[zone.toLowerCase()] ?? null;
}

/**
 * Build an instant from wall-clock fields at the given offset.
 * Out-of-range fields yield null instead of rolling over.
 */
function toInstant(f: DateFields, offsetMinutes: number): Date | null {
  if (f.month < 1 || f.month > 12 || f.day < 1 || f.hour > 23 || f.minute > 59 || f.second > 59) {
    return null;
  }

  const utcMs = Date.UTC(f.year, f.month - 1, f.day, f.hour, f.minute, f.second, f.millisecond);
  const check = new Date(utcMs);
  if (
    check.getUTCFullYear() !== f.year ||
    check.getUTCMonth() !== f.month - 1 ||
    check.getUTCDate() !== f.day
  ) {
    return null;
  }

  return new Date(utcMs - offsetMinutes * 60 * 1000);
}

function matchPatterns(value: string): PatternMatch | null | undefined {
  for (const pattern of PATTERNS) {
    const m = value.match(pattern.regex);
    if (m) {
      return pattern.extract(m);
    }
  }
  return undefined;
}

/**
 * Parse a feed date string into an absolute instant.
 * Returns null when nothing recognizable is found.
 */
export function parseTimestamp(
  raw: string | null | undefined,
  localOffsetMinutes: number = KST_OFFSET_MINUTES
): Date | null {
  const value = (raw ?? "").trim().replace(/\s+/g, " ");
  if (!value) return null;

  const utc = value.match(UTC_MARKER);
  if (utc) {
    const matched = matchPatterns(utc[1].trim());
    if (matched && matched.zone === undefined) {
      return toInstant(matched.fields, 0);
    }
  }

  const matched = matchPatterns(value);
  if (matched !== undefined) {
    if (matched === null) return null;
    const offset = matched.zone === undefined ? localOffsetMinutes : parseZone(matched.zone);
    return offset === null ? null : toInstant(matched.fields, offset);
  }

  const embedded = value.match(FALLBACK);
  if (!embedded) return null;

  return toInstant(
    fields(embedded[1], embedded[2], embedded[3], embedded[4], embedded[5]),
    localOffsetMinutes
  );
}

/**
 * Render an instant as "YYYY-MM-DD HH:MM" wall-clock time at the given offset
 */
export function formatLocal(date: Date, offsetMinutes: number = KST_OFFSET_MINUTES): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60 * 1000);
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())} ` +
    `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}`
  );
}
