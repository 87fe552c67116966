export interface DateParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

/**
 * Calendar fields of `date` as seen in `timeZone`, zero-padded.
 */
export const datePartsIn = (date: Date, timeZone: string): DateParts => {
  const parts: DateParts = { year: '', month: '', day: '', hour: '', minute: '', second: '' };
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    switch (part.type) {
      case 'year':
      case 'month':
      case 'day':
      case 'hour':
      case 'minute':
      case 'second':
        parts[part.type] = part.value;
        break;
      default:
        break;
    }
  }
  return parts;
};

export const formatDate = (date: Date, timeZone: string): string => {
  const { day, month, year } = datePartsIn(date, timeZone);
  return `${day}-${month}-${year}`;
};

export const formatDateTime = (date: Date, timeZone: string): string => {
  const { hour, minute, second } = datePartsIn(date, timeZone);
  return `${formatDate(date, timeZone)} ${hour}:${minute}:${second}`;
};

export const formatPostDate = (date: Date, timeZone: string): string => {
  const { year, month, day, hour, minute } = datePartsIn(date, timeZone);
  return `${year}-${month}-${day} ${hour}:${minute}`;
};

export const fileTimestamp = (date: Date, timeZone: string): string => {
  const { year, month, day, hour, minute, second } = datePartsIn(date, timeZone);
  return `${year}-${month}-${day}_${hour}-${minute}-${second}`;
};

/**
 * Whole calendar days from `from` to `to` in `timeZone`.
 */
export const calendarDaysBetween = (from: Date, to: Date, timeZone: string): number => {
  const toUtcMidnight = (date: Date): number => {
    const { year, month, day } = datePartsIn(date, timeZone);
    return Date.UTC(Number(year), Number(month) - 1, Number(day));
  };
  return Math.round((toUtcMidnight(to) - toUtcMidnight(from)) / (24 * 60 * 60 * 1000));
};
