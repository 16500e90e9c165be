/**
 * Time zone aware date formatting for report headers and footers
 */

export interface ZonedTimestamp {
  /** YYYY-MM-DD */
  date: string;
  /** YYYY-MM-DD HH:mm:ss */
  dateTime: string;
  /** Short zone label for the same zone the time was rendered in, e.g. EST/EDT */
  zone: string;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function formatTimestamp(now: Date, timeZone: string): ZonedTimestamp {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
    timeZoneName: 'short',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  const date = `${part('year')}-${part('month')}-${part('day')}`;
  const time = `${part('hour')}:${part('minute')}:${part('second')}`;

  return {
    date,
    dateTime: `${date} ${time}`,
    zone: part('timeZoneName') || timeZone,
  };
}
