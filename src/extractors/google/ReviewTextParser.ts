/**
 * 리뷰 텍스트 분리
 *
 * 리뷰 본문 / 항목별 평점 태그 / 사장님 답글 / 번역-원문 분리
 */

import { HumanizedDate } from "@/extractors/common/HumanizedDate";
import { TextNormalizer } from "@/extractors/common/TextNormalizer";

/** 항목별 평점 라벨 */
export const ASPECT_LABELS = [
  "Rooms",
  "Service",
  "Location",
  "Hotel highlights",
  "Nearby activities",
  "Safety",
  "Walkability",
  "Food & drinks",
  "Noteworthy details",
] as const;

const OWNER_RESPONSE_MARKER = "Response from the owner";
const TRANSLATED_MARKER = "(Translated by Google)";
const ORIGINAL_MARKER = "(Original)";

/** 첫 번째 평점 태그 (예: "Rooms: 4/5") */
const DIALOG_TAG_PATTERN = /(\w+:\s\d\/5)/;

const SCORE_PATTERN = /(\d+(?:\.\d+)?)\s*\/\s*(\d+)/;

const REVIEW_DATE_PATTERN = /^(.*?\bago)\s+on\s+(.+)$/i;

export interface ParsedReviewText {
  fullReview: string | null;
  ratingTags: string | null;
  enLangText: string | null;
  otherLangText: string | null;
  ownerResponseText: string | null;
  ownerResponseTime: string | null;
}

export interface ParsedScore {
  ratingScore: number;
  totalRatingScore: number;
}

export interface ParsedReviewDate {
  date: string | null;
  reviewSite: string | null;
}

function isAspectLabel(text: string): boolean {
  return ASPECT_LABELS.some((label) => label === text);
}

function formatRatingTags(parts: readonly string[]): string | null {
  return TextNormalizer.clean(parts.join(" ").replaceAll(".0", ".0,"));
}

export class ReviewTextParser {
  /**
   * 전체 화면 리뷰 텍스트 조각 분리
   *
   * 입력 예:
   * ["Great breakfast.", "Rooms", "4.0", "Service", "5.0",
   *  "Response from the owner", "a week ago\nThank you!"]
   *
   * - 답글 마커 이후: 첫 줄 = 답글 시각, 나머지 = 답글 본문
   * - 첫 조각이 평점 라벨이 아니면 리뷰 본문, 나머지는 평점 태그
   * - "(Original)" 포함 시 번역본/원문 분리 (fullReview 유지)
   */
  static parseFullScreen(
    parts: readonly string[],
    now: Date = new Date(),
  ): ParsedReviewText {
    const result: ParsedReviewText = {
      fullReview: null,
      ratingTags: null,
      enLangText: null,
      otherLangText: null,
      ownerResponseText: null,
      ownerResponseTime: null,
    };

    let texts = parts.filter((part) => part.length > 0);

    const ownerIndex = texts.findIndex((text) =>
      text.toLowerCase().includes(OWNER_RESPONSE_MARKER.toLowerCase()),
    );
    if (ownerIndex >= 0) {
      const lines = texts
        .slice(ownerIndex + 1)
        .join("\n")
        .replace(/^\n+|\n+$/g, "")
        .split("\n");
      result.ownerResponseTime = HumanizedDate.toTimestamp(lines[0], now);
      result.ownerResponseText = TextNormalizer.clean(lines.slice(1).join(" "));
      texts = texts.slice(0, ownerIndex);
    }

    // 답글만 있는 리뷰
    if (texts.length === 0) {
      return result;
    }

    const first = texts[0].replace(/\n/g, " ");
    let review: string | null;
    if (texts.length === 1) {
      review = first;
    } else if (isAspectLabel(first)) {
      review = null;
      result.ratingTags = formatRatingTags([first, ...texts.slice(1)]);
    } else {
      review = first;
      result.ratingTags = formatRatingTags(texts.slice(1));
    }

    if (review === null) {
      return result;
    }

    const originalIndex = review.indexOf(ORIGINAL_MARKER);
    if (originalIndex >= 0) {
      result.fullReview = TextNormalizer.clean(review);
      result.enLangText = TextNormalizer.clean(
        review.slice(0, originalIndex).replace(TRANSLATED_MARKER, ""),
      );
      result.otherLangText = TextNormalizer.clean(
        review.slice(originalIndex + ORIGINAL_MARKER.length),
      );
    } else {
      result.enLangText = TextNormalizer.clean(review);
    }

    return result;
  }

  /**
   * 다이얼로그 리뷰 텍스트에서 평점 태그 분리
   *
   * "Nice place for a monthRooms: 4/5 | Service: 5/5"
   * → review "Nice place for a month", ratingTags "Rooms: 4/5 | Service: 5/5"
   */
  static splitDialogText(text: string): {
    review: string | null;
    ratingTags: string | null;
  } {
    // 본문 끝과 태그 사이에 공백이 없는 경우 대비
    const spaced = ASPECT_LABELS.reduce(
      (result, label) => result.replaceAll(`${label}:`, ` ${label}:`),
      text,
    );

    const match = DIALOG_TAG_PATTERN.exec(spaced);
    if (!match) {
      return { review: TextNormalizer.clean(spaced), ratingTags: null };
    }

    return {
      review: TextNormalizer.clean(spaced.slice(0, match.index)),
      ratingTags: TextNormalizer.clean(spaced.slice(match.index)),
    };
  }

  /**
   * 평점 텍스트 분리 ("4/5" → 4, 5)
   */
  static parseScore(text: string | null | undefined): ParsedScore | null {
    const match = text ? SCORE_PATTERN.exec(text) : null;
    if (!match) {
      return null;
    }
    return {
      ratingScore: Number.parseFloat(match[1]),
      totalRatingScore: Number.parseInt(match[2], 10),
    };
  }

  /**
   * 게시일 텍스트 분리 ("3 weeks ago on Google" → "3 weeks ago", "Google")
   */
  static splitReviewDate(text: string | null | undefined): ParsedReviewDate {
    const cleaned = TextNormalizer.clean(text);
    if (!cleaned) {
      return { date: null, reviewSite: null };
    }
    const match = REVIEW_DATE_PATTERN.exec(cleaned);
    if (!match) {
      return { date: cleaned, reviewSite: null };
    }
    return { date: match[1], reviewSite: match[2] };
  }
}
