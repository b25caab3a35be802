/**
 * StopCriterion - 스크롤 중단 조건
 *
 * 지정한 작성자/리뷰 텍스트를 만나면 (해당 리뷰 포함) 수집 종료
 * 비교: 각 필드의 앞 50자 완전 일치 (대소문자 구분)
 */

import { z } from "zod";
import {
  ReviewRecord,
  boundedPrefix,
  reviewTextOf,
} from "@/core/domain/ReviewRecord";

export const StopCriterionSchema = z
  .object({
    username: z.string().min(1).optional(),
    reviewText: z.string().min(1).optional(),
  })
  .refine((value) => value.username !== undefined || value.reviewText !== undefined, {
    message: "stop criterion needs a username or a review text",
  });

export type StopCriterion = z.infer<typeof StopCriterionSchema>;

/**
 * 중단 조건 일치 여부
 * 지정된 모든 필드가 일치해야 true
 */
export function matchesStopCriterion(
  record: ReviewRecord,
  criterion: StopCriterion,
): boolean {
  const checks: Array<[string | undefined, string]> = [
    [criterion.username, record.username],
    [criterion.reviewText, reviewTextOf(record)],
  ];

  const provided = checks.filter(
    (check): check is [string, string] => check[0] !== undefined,
  );
  if (provided.length === 0) {
    return false;
  }

  return provided.every(
    ([pattern, value]) => boundedPrefix(value) === boundedPrefix(pattern),
  );
}

/**
 * CLI/설정 값으로 중단 조건 생성 (둘 다 비어 있으면 undefined)
 */
export function buildStopCriterion(
  username?: string | null,
  reviewText?: string | null,
): StopCriterion | undefined {
  const criterion: StopCriterion = {};
  if (username) criterion.username = username;
  if (reviewText) criterion.reviewText = reviewText;
  return criterion.username || criterion.reviewText ? criterion : undefined;
}
