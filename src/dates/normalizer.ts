import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { JalaliDate, NormalizedDeadline } from '../types/index.js';
import { NormalizeError } from '../utils/errors.js';
import { err, ok, Result } from '../utils/result.js';
import { gregorianToJalali, jalaliMonthLength, jalaliToGregorianUtc } from './jalali.js';

dayjs.extend(utc);

const MINUTE = 60 * 1000;
const END_OF_DAY_MS = (23 * 60 * 60 + 59 * 60 + 59) * 1000;

export const PERSIAN_MONTHS: Readonly<Record<string, number | undefined>> = {
  'فروردین': 1,
  'اردیبهشت': 2,
  'خرداد': 3,
  'تیر': 4,
  'مرداد': 5,
  'شهریور': 6,
  'مهر': 7,
  'آبان': 8,
  'آذر': 9,
  'دی': 10,
  'بهمن': 11,
  'اسفند': 12,
};

/** Maps Persian (U+06F0..) and Arabic-Indic (U+0660..) digits to ASCII. */
export function toAsciiDigits(text: string): string {
  return text.replace(/[\u06f0-\u06f9\u0660-\u0669]/g, (ch) => {
    const code = ch.charCodeAt(0);
    return String(code >= 0x06f0 ? code - 0x06f0 : code - 0x0660);
  });
}

function normalizeMonthName(token: string): string {
  return token
    .replace(/ي/g, 'ی') // Arabic yeh
    .replace(/ك/g, 'ک') // Arabic kaf
    .replace(/[\u200c\u200f]/g, '')
    .trim();
}

function toNormalized(jalali: JalaliDate, utcOffsetMinutes: number): NormalizedDeadline {
  const civilMidnight = jalaliToGregorianUtc(jalali);
  const windowStart = new Date(civilMidnight - utcOffsetMinutes * MINUTE);
  return {
    jalali,
    gregorianDate: dayjs.utc(civilMidnight).format('YYYY-MM-DD'),
    windowStart,
    dueInstant: new Date(windowStart.getTime() + END_OF_DAY_MS),
  };
}

/**
 * Resolves a yearless Jalali day/month into the next occurrence that has not
 * yet passed at `referenceNow`. The due moment is 23:59:59 local time at the
 * fixed `utcOffsetMinutes`.
 */
export function normalizeDeadline(
  dayToken: string,
  monthToken: string,
  referenceNow: Date,
  utcOffsetMinutes: number
): Result<NormalizedDeadline, NormalizeError> {
  const dayText = toAsciiDigits(dayToken.trim());
  const input = `${dayToken} ${monthToken}`;

  if (!/^\d{1,2}$/.test(dayText)) {
    return err({ code: 'InvalidDateFormat', message: `Invalid day "${dayToken}"`, input });
  }

  const monthName = normalizeMonthName(monthToken);
  const month = PERSIAN_MONTHS[monthName];
  if (month === undefined) {
    return err({ code: 'InvalidMonth', message: `Invalid Persian month: ${monthToken}`, month: monthToken });
  }

  const day = Number.parseInt(dayText, 10);
  if (day < 1 || day > 31) {
    return err({ code: 'InvalidDateFormat', message: `Day ${day} is out of range`, input });
  }

  const localNow = new Date(referenceNow.getTime() + utcOffsetMinutes * MINUTE);
  const currentYear = gregorianToJalali(localNow).year;

  for (const year of [currentYear, currentYear + 1]) {
    if (day > jalaliMonthLength(year, month)) continue;
    const candidate = toNormalized({ year, month, day }, utcOffsetMinutes);
    if (candidate.dueInstant.getTime() >= referenceNow.getTime()) {
      return ok(candidate);
    }
  }

  return err({ code: 'InvalidDateFormat', message: `${monthName} has no day ${day} in the coming year`, input });
}

/** Splits text such as "۲۵ اردیبهشت" into its day and month and normalizes it. */
export function parseDeadlineText(
  text: string,
  referenceNow: Date,
  utcOffsetMinutes: number
): Result<NormalizedDeadline, NormalizeError> {
  const parts = text.trim().split(/\s+/).filter(Boolean);
  if (parts.length !== 2) {
    return err({ code: 'InvalidDateFormat', message: `Invalid Persian date format: ${text}`, input: text });
  }
  return normalizeDeadline(parts[0], parts[1], referenceNow, utcOffsetMinutes);
}
