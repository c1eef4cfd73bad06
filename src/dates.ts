// Scheduled times are wall-clock times on the machine running the app: inputs
// without an offset are read as local time and rendered back the same way.

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:\d{2})?$/;
const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAY_SHORT = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTH_SHORT = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// Date.UTC and the Date constructor read years 0-99 as 1900-1999, so the
// year is always applied through setFullYear / setUTCFullYear.
function utcDate(year: number, monthIndex: number, day: number, hour = 0, minute = 0, second = 0, millis = 0) {
  const dt = new Date(Date.UTC(2000, 0, 1, hour, minute, second, millis));
  dt.setUTCFullYear(year, monthIndex, day);
  return dt;
}

function localDate(year: number, monthIndex: number, day: number, hour = 0, minute = 0, second = 0, millis = 0) {
  const dt = new Date(2000, 0, 1, hour, minute, second, millis);
  dt.setFullYear(year, monthIndex, day);
  return dt;
}

function daysInMonth(year: number, month: number) {
  return utcDate(year, month, 0).getUTCDate();
}

function pad(n: number, width = 2) {
  return String(n).padStart(width, '0');
}

/**
 * Parses `YYYY-MM-DDTHH:mm[:ss[.fff]][Z|±HH:MM]` into epoch ms.
 * Returns undefined for anything else, including impossible dates.
 */
export function parseScheduledDatetime(value: string): number | undefined {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const [, y, mo, d, h, mi, s = '0', frac = '', zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = frac ? Math.round(Number(`0.${frac}`) * 1000) : 0;

  if (year < 1 || month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  if (zone) {
    const utc = utcDate(year, month - 1, day, hour, minute, second, millis).getTime();
    if (zone === 'Z') return utc;
    const sign = zone.startsWith('-') ? -1 : 1;
    const offsetHours = Number(zone.slice(1, 3));
    const offsetMins = Number(zone.slice(4, 6));
    if (offsetHours > 23 || offsetMins > 59) return undefined;
    return utc - sign * (offsetHours * 60 + offsetMins) * 60_000;
  }

  return localDate(year, month - 1, day, hour, minute, second, millis).getTime();
}

/** `YYYY-MM-DDTHH:mm:ss` in local time. */
export function formatLocalIso(ms: number): string {
  const dt = new Date(ms);
  return `${localDateKey(dt)}T${pad(dt.getHours())}:${pad(dt.getMinutes())}:${pad(dt.getSeconds())}`;
}

export function localDateKey(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function parseDateKey(value: string): Date | undefined {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return undefined;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined;
  return localDate(year, month - 1, day);
}

export function startOfDay(date: Date): Date {
  return localDate(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  return localDate(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

export function formatTime(ms: number): string {
  const dt = new Date(ms);
  return `${pad(dt.getHours())}:${pad(dt.getMinutes())}`;
}

/** e.g. `Tue, Jan 15` */
export function formatDayLabel(date: Date): string {
  return `${WEEKDAY_SHORT[date.getDay()]}, ${MONTH_SHORT[date.getMonth()]} ${date.getDate()}`;
}

/** e.g. `Tue, Jan 15 2030 · 09:30` */
export function formatScheduled(ms: number): string {
  const dt = new Date(ms);
  return `${formatDayLabel(dt)} ${dt.getFullYear()} · ${formatTime(ms)}`;
}

/** e.g. `Jan 15 – 28` or `Jan 25 – Feb 7` */
export function formatRange(start: Date, end: Date): string {
  const startMonth = MONTH_SHORT[start.getMonth()];
  const endMonth = MONTH_SHORT[end.getMonth()];
  if (start.getMonth() === end.getMonth()) {
    return `${startMonth} ${start.getDate()} – ${end.getDate()}`;
  }
  return `${startMonth} ${start.getDate()} – ${endMonth} ${end.getDate()}`;
}
