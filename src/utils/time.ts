const pad = (value: number, width = 2): string =>
  String(value).padStart(width, '0');

/**
 * Format a date in local time. Supported tokens: YYYY, MM, DD, HH, mm, ss, SSS.
 */
export function formatTimestamp(date: Date, pattern: string): string {
  return pattern.replace(/YYYY|MM|DD|HH|mm|ss|SSS/g, token => {
    switch (token) {
      case 'YYYY':
        return String(date.getFullYear());
      case 'MM':
        return pad(date.getMonth() + 1);
      case 'DD':
        return pad(date.getDate());
      case 'HH':
        return pad(date.getHours());
      case 'mm':
        return pad(date.getMinutes());
      case 'ss':
        return pad(date.getSeconds());
      default:
        return pad(date.getMilliseconds(), 3);
    }
  });
}

/**
 * Render a duration as HH:MM:SS.mmm
 */
export function formatElapsed(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = Math.floor((total % 60_000) / 1000);
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(total % 1000, 3)}`;
}

export interface TimeOfDay {
  hour: number;
  minute?: number;
  second?: number;
}

/**
 * Parse "HH:MM" / "HH:MM:SS" (or an object) into seconds since midnight.
 */
export function secondsOfDay(time: string | TimeOfDay): number {
  if (typeof time !== 'string') {
    return checkTime(time.hour, time.minute ?? 0, time.second ?? 0, time);
  }
  const match = time.trim().match(/^(\d{1,2}):(\d{2})(?::(\d{2}))?$/);
  if (!match) {
    throw new Error(`Invalid time of day: ${time}. Expected HH:MM or HH:MM:SS`);
  }
  return checkTime(
    Number(match[1]),
    Number(match[2]),
    Number(match[3] ?? '0'),
    time
  );
}

function checkTime(
  hour: number,
  minute: number,
  second: number,
  source: string | TimeOfDay
): number {
  if (hour > 23 || minute > 59 || second > 59 || hour < 0 || minute < 0 || second < 0) {
    throw new Error(`Invalid time of day: ${JSON.stringify(source)}`);
  }
  return hour * 3600 + minute * 60 + second;
}
