const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86400000;

export function isValidDateString(date: string): boolean {
  if (typeof date !== "string") return false;
  if (!DATE_REGEX.test(date)) return false;
  const d = new Date(date + "T00:00:00Z");
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === date;
}

export function todayISO(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function addDays(dateStr: string, days: number): string {
  const d = new Date(dateStr + "T12:00:00Z");
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

export interface IsoWeek {
  year: number;
  week: number;
}

export function isoWeek(dateStr: string): IsoWeek {
  const [y, m, d] = dateStr.split("-").map(Number);
  const date = new Date(Date.UTC(y, m - 1, d));
  const dayNum = (date.getUTCDay() + 6) % 7;
  const thursday = new Date(date.getTime() + (3 - dayNum) * DAY_MS);
  const year = thursday.getUTCFullYear();
  const jan4 = new Date(Date.UTC(year, 0, 4));
  const jan4DayNum = (jan4.getUTCDay() + 6) % 7;
  const daysSinceJan4 = Math.round((thursday.getTime() - jan4.getTime()) / DAY_MS);
  return { year, week: 1 + Math.round((daysSinceJan4 - 3 + jan4DayNum) / 7) };
}
