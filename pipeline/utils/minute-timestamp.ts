const MINUTE_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;

export interface MinuteTimestamp {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

/**
 * Strict `YYYY-MM-DD HH:MM` parse. Returns null for anything else, including
 * well-formed strings naming a minute that does not exist (`2026-02-30 10:00`,
 * `2026-02-16 24:00`).
 */
export const parseMinuteTimestamp = (value: string): MinuteTimestamp | null => {
  const match = MINUTE_TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute] = match.slice(1).map(Number);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || day < 1) {
    return null;
  }

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }

  return { year, month, day, hour, minute };
};

/** Minutes since the Unix epoch, treating the timestamp as UTC wall time. */
export const toEpochMinutes = (timestamp: MinuteTimestamp): number =>
  Date.UTC(timestamp.year, timestamp.month - 1, timestamp.day, timestamp.hour, timestamp.minute) /
  60_000;

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

export const formatCompactStamp = (timestamp: MinuteTimestamp): string =>
  `${pad(timestamp.year, 4)}${pad(timestamp.month)}${pad(timestamp.day)}_` +
  `${pad(timestamp.hour)}${pad(timestamp.minute)}`;
