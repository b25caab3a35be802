/**
 * ReviewRecord 도메인 모델
 *
 * 리뷰 요소 하나의 DOM 스냅샷에서 생성되는 불변 레코드
 * - 화면에 안정적인 ID가 없으므로 identity는 보이는 내용으로 계산
 */

import { REVIEW_MATCH_CONFIG } from "@/config/constants";

export interface ReviewRecord {
  /** 번역/원문 쌍이 있을 때의 전체 리뷰 텍스트 */
  readonly fullReview: string | null;
  /** 항목별 평점 (예: "Rooms 4.0, Service 5.0,") */
  readonly ratingTags: string | null;
  readonly enLangText: string | null;
  readonly otherLangText: string | null;
  readonly ownerResponseText: string | null;
  readonly ownerResponseTime: string | null;
  readonly username: string;
  readonly userProfile: string | null;
  /** 상대 날짜 (예: "2 weeks ago") */
  readonly date: string | null;
  /** 변환된 게시일 (MM-DD-YYYY HH:mm:ss) */
  readonly reviewPostDate: string | null;
  /** 리뷰 출처 (예: "Google", "Agoda", "other") */
  readonly reviewSite: string | null;
  readonly ratingScore: number;
  readonly totalRatingScore: number;
  readonly stayType: string | null;
  readonly reviewImages: readonly string[];
}

/**
 * 빈 필드 기본값
 */
export const EMPTY_REVIEW_FIELDS = {
  fullReview: null,
  ratingTags: null,
  enLangText: null,
  otherLangText: null,
  ownerResponseText: null,
  ownerResponseTime: null,
  userProfile: null,
  date: null,
  reviewPostDate: null,
  reviewSite: null,
  stayType: null,
  reviewImages: [],
} as const satisfies Omit<
  ReviewRecord,
  "username" | "ratingScore" | "totalRatingScore"
>;

/**
 * ReviewRecord 생성 (불변 객체)
 */
export function createReviewRecord(
  fields: Pick<ReviewRecord, "username" | "ratingScore" | "totalRatingScore"> &
    Partial<ReviewRecord>,
): ReviewRecord {
  return Object.freeze({
    ...EMPTY_REVIEW_FIELDS,
    ...fields,
    reviewImages: Object.freeze([...(fields.reviewImages ?? [])]),
  });
}

/**
 * 텍스트 앞부분 (bounded prefix)
 */
export function boundedPrefix(
  text: string | null | undefined,
  length: number = REVIEW_MATCH_CONFIG.BOUNDED_PREFIX_LENGTH,
): string {
  return (text ?? "").slice(0, length);
}

/**
 * 리뷰 본문 (번역본 우선)
 */
export function reviewTextOf(record: ReviewRecord): string {
  return record.enLangText ?? record.fullReview ?? "";
}

/**
 * Identity key
 * (작성자, 본문 앞 50자, 상대 날짜 또는 변환 날짜)
 *
 * 상대 날짜가 우선: 변환 날짜는 현재 시각 기준이라 반복마다 달라질 수 있음
 */
export function reviewIdentityKey(record: ReviewRecord): string {
  return [
    record.username,
    boundedPrefix(reviewTextOf(record)),
    record.date ?? record.reviewPostDate ?? "",
  ].join(REVIEW_MATCH_CONFIG.KEY_SEPARATOR);
}
