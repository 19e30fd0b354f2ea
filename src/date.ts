export interface NoteDate {
  month: number;
  day: number;
  year: number;
}

const DATE_NAME_PATTERN = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;
const DUPLICATE_SUFFIX = /\(\d+\)$/;

// Bucket folder names produced by bucketLabel().
export const BUCKET_PATTERN = /^\d{4}-\d{2}$/;

/**
 * Parse a daily-note name like `6-29-2025.md` or `6-29-2025(1).md`.
 * Returns null when the name is not `M-D-YYYY` or the date does not exist.
 */
export function parseNoteDate(fileName: string): NoteDate | null {
  let stem = fileName.endsWith(".md") ? fileName.slice(0, -".md".length) : fileName;
  stem = stem.replace(DUPLICATE_SUFFIX, "");

  const match = stem.match(DATE_NAME_PATTERN);
  if (!match) {
    return null;
  }

  const month = Number(match[1]);
  const day = Number(match[2]);
  const year = Number(match[3]);
  return isCalendarDate(year, month, day) ? { month, day, year } : null;
}

export function isCalendarDate(year: number, month: number, day: number): boolean {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }

  // setUTCFullYear avoids Date.UTC's 0-99 => 1900-1999 mapping.
  const parsed = new Date(0);
  parsed.setUTCFullYear(year, month - 1, day);
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

export function bucketLabel(date: Pick<NoteDate, "month" | "year">): string {
  return `${String(date.year).padStart(4, "0")}-${String(date.month).padStart(2, "0")}`;
}

// Sortable key, e.g. 2025-06-29.
export function dateKey(date: NoteDate): string {
  return `${bucketLabel(date)}-${String(date.day).padStart(2, "0")}`;
}

export function formatLongDate(date: NoteDate): string {
  const utc = new Date(0);
  utc.setUTCFullYear(date.year, date.month - 1, date.day);
  const monthName = new Intl.DateTimeFormat("en-US", { month: "long", timeZone: "UTC" }).format(utc);
  return `${monthName} ${date.day}, ${date.year}`;
}

// Local-time stamp used for backup folder names: 20250629_142501
export function formatBackupStamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}
