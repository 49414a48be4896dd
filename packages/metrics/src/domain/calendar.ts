export const WEEKDAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

export type LocalTime = {
  date: string;
  hour: number;
  weekday: number;
  weekdayName: WeekdayName;
};

const SECONDS_PER_DAY = 86_400;

const pad2 = (value: number): string => String(value).padStart(2, "0");

/**
 * Wall-clock view of an instant in the offset it was recorded with.
 * Uses UTC getters on a shifted date so the host time zone never matters.
 */
export const toLocalTime = (timestamp: number, utcOffsetMinutes: number): LocalTime => {
  const shifted = new Date((timestamp + utcOffsetMinutes * 60) * 1000);
  const weekday = shifted.getUTCDay();

  return {
    date: `${shifted.getUTCFullYear()}-${pad2(shifted.getUTCMonth() + 1)}-${pad2(shifted.getUTCDate())}`,
    hour: shifted.getUTCHours(),
    weekday,
    weekdayName: WEEKDAY_NAMES[weekday] ?? "Sunday",
  };
};

export const isWeekday = (weekday: number): boolean => weekday >= 1 && weekday <= 5;

export const secondsToDays = (seconds: number): number => seconds / SECONDS_PER_DAY;

export const toIsoString = (timestamp: number): string => new Date(timestamp * 1000).toISOString();
