export type GitDate = {
  timestamp: number;
  utcOffsetMinutes: number;
};

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

// git log --date=default: "Thu Oct 2 14:03:11 2025 +0200"
const DEFAULT_FORMAT = /^[A-Za-z]{3}\s+([A-Za-z]{3})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})\s+([+-])(\d{2})(\d{2})$/;
// git log --date=iso: "2025-10-02 14:03:11 +0200"
const ISO_FORMAT = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;
// git log --date=iso-strict and plain ISO 8601: "2025-10-02T14:03:11+02:00", "...Z"
const ISO_STRICT_FORMAT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|([+-])(\d{2}):?(\d{2}))$/;

type DateParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  utcOffsetMinutes: number;
};

const toOffsetMinutes = (sign: string, hours: string, minutes: string): number => {
  const magnitude = Number(hours) * 60 + Number(minutes);
  return sign === "-" ? -magnitude : magnitude;
};

const toGitDate = (parts: DateParts): GitDate | null => {
  const { year, month, day, hour, minute, second, utcOffsetMinutes } = parts;
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 60) {
    return null;
  }

  const localMillis = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(localMillis);
  if (check.getUTCDate() !== day || check.getUTCMonth() !== month - 1) {
    return null;
  }

  return {
    timestamp: localMillis / 1000 - utcOffsetMinutes * 60,
    utcOffsetMinutes,
  };
};

const parseDefaultFormat = (value: string): GitDate | null => {
  const match = value.match(DEFAULT_FORMAT);
  if (match === null) {
    return null;
  }

  const [, monthName = "", day = "", hour = "", minute = "", second = "", year = "", sign = "", offH = "", offM = ""] =
    match;
  const month = MONTHS.indexOf(monthName.toLowerCase()) + 1;
  if (month === 0) {
    return null;
  }

  return toGitDate({
    year: Number(year),
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    utcOffsetMinutes: toOffsetMinutes(sign, offH, offM),
  });
};

const parseIsoFormat = (value: string): GitDate | null => {
  const match = value.match(ISO_FORMAT);
  if (match === null) {
    return null;
  }

  const [, year = "", month = "", day = "", hour = "", minute = "", second = "", sign = "", offH = "", offM = ""] =
    match;
  return toGitDate({
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    utcOffsetMinutes: toOffsetMinutes(sign, offH, offM),
  });
};

const parseIsoStrictFormat = (value: string): GitDate | null => {
  const match = value.match(ISO_STRICT_FORMAT);
  if (match === null) {
    return null;
  }

  const [, year = "", month = "", day = "", hour = "", minute = "", second = "", zone = "", sign, offH, offM] = match;
  const utcOffsetMinutes =
    zone === "Z" || sign === undefined || offH === undefined || offM === undefined
      ? 0
      : toOffsetMinutes(sign, offH, offM);

  return toGitDate({
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    utcOffsetMinutes,
  });
};

/**
 * Parses the date formats git prints for `%ad` and `%(creatordate)`.
 * The offset written in the string is kept so calendar buckets use the author's local time.
 */
export const parseGitDate = (value: string): GitDate | null => {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  return parseIsoStrictFormat(trimmed) ?? parseIsoFormat(trimmed) ?? parseDefaultFormat(trimmed);
};
