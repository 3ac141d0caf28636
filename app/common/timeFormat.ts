/**
 * Date formatting for log lines and file names, using local time.
 *
 *    formatLogTimestamp(date)  -> "2024-02-12 00:51:06.123"
 *    formatFileStamp(date)     -> "20240212_005106"
 */

function pad(num: number, len: number): string {
  return num.toString().padStart(len, "0");
}

interface DateParts {
  year: string;
  month: string;
  day: string;
  hours: string;
  minutes: string;
  seconds: string;
}

function getDateParts(date: Date): DateParts {
  return {
    year: String(date.getFullYear()),
    month: pad(date.getMonth() + 1, 2),
    day: pad(date.getDate(), 2),
    hours: pad(date.getHours(), 2),
    minutes: pad(date.getMinutes(), 2),
    seconds: pad(date.getSeconds(), 2),
  };
}

export function formatLogTimestamp(date: Date): string {
  const p = getDateParts(date);
  return `${p.year}-${p.month}-${p.day} ${p.hours}:${p.minutes}:${p.seconds}.${pad(date.getMilliseconds(), 3)}`;
}

// Sorts in time order when compared as a string.
export function formatFileStamp(date: Date): string {
  const p = getDateParts(date);
  return `${p.year}${p.month}${p.day}_${p.hours}${p.minutes}${p.seconds}`;
}
