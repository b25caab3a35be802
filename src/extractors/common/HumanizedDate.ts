/**
 * 상대 날짜 변환
 *
 * "just now", "a minute ago", "2 hours ago", "5 months ago" 등을
 * 기준 시각에서 뺀 절대 시각 (MM-DD-YYYY HH:mm:ss)으로 변환
 */

import { formatReviewTimestamp } from "@/utils/timestamp";

const DATE_UNITS = ["minute", "hour", "day", "week", "month", "year"] as const;

type DateUnit = (typeof DATE_UNITS)[number];

const PLURAL_PATTERN = /(\d+)\D*?\b(minute|hour|day|week|month|year)s\b/i;
const SINGULAR_PATTERN = /\b(minute|hour|day|week|month|year)\b/i;

function toUnit(value: string): DateUnit | undefined {
  const lower = value.toLowerCase();
  return DATE_UNITS.find((unit) => unit === lower);
}

/**
 * 월 단위 빼기 (말일 보정: 3/31 - 1개월 = 2월 말일)
 */
function subtractMonths(date: Date, months: number): Date {
  const result = new Date(date.getTime());
  const targetMonthIndex = date.getFullYear() * 12 + date.getMonth() - months;
  const year = Math.floor(targetMonthIndex / 12);
  const month = targetMonthIndex - year * 12;
  const lastDay = new Date(year, month + 1, 0).getDate();

  result.setDate(1);
  result.setFullYear(year, month, Math.min(date.getDate(), lastDay));
  return result;
}

function subtract(now: Date, unit: DateUnit, amount: number): Date {
  const result = new Date(now.getTime());
  switch (unit) {
    case "minute":
      result.setMinutes(result.getMinutes() - amount);
      return result;
    case "hour":
      result.setHours(result.getHours() - amount);
      return result;
    case "day":
      result.setDate(result.getDate() - amount);
      return result;
    case "week":
      result.setDate(result.getDate() - amount * 7);
      return result;
    case "month":
      return subtractMonths(now, amount);
    case "year":
      return subtractMonths(now, amount * 12);
  }
}

export class HumanizedDate {
  /**
   * 상대 날짜 → MM-DD-YYYY HH:mm:ss
   * @param now - 기준 시각 (기본: 현재)
   * @returns 해석 불가 시 null
   */
  static toTimestamp(
    text: string | null | undefined,
    now: Date = new Date(),
  ): string | null {
    if (!text) {
      return null;
    }

    if (/\bnow\b/i.test(text)) {
      return formatReviewTimestamp(now);
    }

    const plural = PLURAL_PATTERN.exec(text);
    if (plural) {
      const unit = toUnit(plural[2]);
      const amount = Number.parseInt(plural[1], 10);
      if (unit && Number.isFinite(amount)) {
        return formatReviewTimestamp(subtract(now, unit, amount));
      }
    }

    const singular = SINGULAR_PATTERN.exec(text);
    if (singular) {
      const unit = toUnit(singular[1]);
      if (unit) {
        return formatReviewTimestamp(subtract(now, unit, 1));
      }
    }

    return null;
  }
}
