import { JalaliDate } from '../types/index.js';

// Years (Jalali) at which the 33-year leap cycle shifts. Valid range is
// [BREAKS[0], BREAKS[last]).
const BREAKS = [
  -61, 9, 38, 199, 426, 686, 756, 818, 1111, 1181, 1210, 1635, 2060, 2097, 2192, 2262, 2324, 2394, 2456,
  3178,
];

function div(a: number, b: number): number {
  return Math.trunc(a / b);
}

function mod(a: number, b: number): number {
  return a - Math.trunc(a / b) * b;
}

interface YearInfo {
  /** Years since the last leap year, 0 when `year` itself is leap. */
  leap: number;
  gregorianYear: number;
  /** Day of March on which 1 Farvardin falls. */
  march: number;
}

function yearInfo(year: number): YearInfo {
  if (year < BREAKS[0] || year >= BREAKS[BREAKS.length - 1]) {
    throw new RangeError(`Jalali year ${year} is out of the supported range`);
  }

  const gregorianYear = year + 621;
  let leapJ = -14;
  let jp = BREAKS[0];
  let jump = 0;

  for (let i = 1; i < BREAKS.length; i++) {
    const jm = BREAKS[i];
    jump = jm - jp;
    if (year < jm) break;
    leapJ += div(jump, 33) * 8 + div(mod(jump, 33), 4);
    jp = jm;
  }

  let n = year - jp;
  leapJ += div(n, 33) * 8 + div(mod(n, 33) + 3, 4);
  if (mod(jump, 33) === 4 && jump - n === 4) leapJ += 1;

  const leapG = div(gregorianYear, 4) - div((div(gregorianYear, 100) + 1) * 3, 4) - 150;
  const march = 20 + leapJ - leapG;

  if (jump - n < 6) n = n - jump + div(jump + 4, 33) * 33;
  let leap = mod(mod(n + 1, 33) - 1, 4);
  if (leap === -1) leap = 4;

  return { leap, gregorianYear, march };
}

export function isLeapJalaliYear(year: number): boolean {
  return yearInfo(year).leap === 0;
}

export function jalaliMonthLength(year: number, month: number): number {
  if (month <= 6) return 31;
  if (month <= 11) return 30;
  return isLeapJalaliYear(year) ? 30 : 29;
}

/** Days from 1 Farvardin to the given day of the same year. */
function dayOfYear(month: number, day: number): number {
  return (month - 1) * 31 - div(month, 7) * (month - 7) + day - 1;
}

/**
 * Gregorian civil date of a Jalali date, as a UTC-midnight timestamp.
 * Pure integer arithmetic; Date.UTC only normalizes day overflow into months.
 */
export function jalaliToGregorianUtc({ year, month, day }: JalaliDate): number {
  const { gregorianYear, march } = yearInfo(year);
  return Date.UTC(gregorianYear, 2, march + dayOfYear(month, day));
}

/** Jalali date of the Gregorian civil date carried by `utcMidnight`'s UTC fields. */
export function gregorianToJalali(utcMidnight: Date): JalaliDate {
  const gy = utcMidnight.getUTCFullYear();
  const target = Date.UTC(gy, utcMidnight.getUTCMonth(), utcMidnight.getUTCDate());

  let year = gy - 621;
  let nowruz = Date.UTC(gy, 2, yearInfo(year).march);
  if (target < nowruz) {
    year -= 1;
    nowruz = Date.UTC(gy - 1, 2, yearInfo(year).march);
  }

  const offset = Math.round((target - nowruz) / 86_400_000);
  if (offset < 186) {
    return { year, month: 1 + div(offset, 31), day: mod(offset, 31) + 1 };
  }
  const rest = offset - 186;
  return { year, month: 7 + div(rest, 30), day: mod(rest, 30) + 1 };
}
