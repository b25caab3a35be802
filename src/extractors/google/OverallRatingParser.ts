/**
 * 전체 평점 라벨 파싱
 *
 * - "3.6 out of 5 stars from 206 reviews" → 3.6, 206
 * - "5-star reviews 72 percent." → "72"
 * - "Rated 4.1 out of 5," → 4.1
 * - "50 reviews on Google" → 50
 */

const RATING_PATTERN = /(\d+(?:\.\d+)?)\s+out of\b/i;
const FROM_COUNT_PATTERN = /\bfrom\s+([\d,]+)\s+reviews?\b/i;
const LEADING_COUNT_PATTERN = /^\s*([\d,]+)\s+reviews?\b/i;
const STAR_SHARE_PATTERN = /-star reviews\s+(\d+(?:\.\d+)?)\s*percent/i;

function toCount(digits: string): number | null {
  const value = Number.parseInt(digits.replace(/,/g, ""), 10);
  return Number.isFinite(value) ? value : null;
}

export class OverallRatingParser {
  /** "x out of 5" 형식에서 평점 추출 */
  static parseRating(label: string | null | undefined): number | null {
    const match = label ? RATING_PATTERN.exec(label) : null;
    return match ? Number.parseFloat(match[1]) : null;
  }

  /**
   * 리뷰 수 추출
   * "... from 206 reviews" 또는 "50 reviews on Google"
   */
  static parseReviewCount(label: string | null | undefined): number | null {
    if (!label) {
      return null;
    }
    const match = FROM_COUNT_PATTERN.exec(label) ?? LEADING_COUNT_PATTERN.exec(label);
    return match ? toCount(match[1]) : null;
  }

  /** 별점별 비율 (%) 문자열 */
  static parseStarShare(label: string | null | undefined): string | null {
    const match = label ? STAR_SHARE_PATTERN.exec(label) : null;
    return match ? match[1] : null;
  }
}
