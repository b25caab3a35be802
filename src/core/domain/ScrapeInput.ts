/**
 * ScrapeInput - 스크래핑 입력 스키마
 */

import { z } from "zod";
import { StopCriterionSchema } from "@/core/domain/StopCriterion";

/**
 * 리뷰 정렬 옵션
 * 출력 파일명에도 사용 (reviews_{sortBy}.csv)
 */
export const SORT_OPTIONS = [
  "most_helpful",
  "most_recent",
  "highest_score",
  "lowest_score",
] as const;

export const SortBySchema = z.enum(SORT_OPTIONS);

export type SortBy = z.infer<typeof SortBySchema>;

export const ScrapeInputSchema = z.object({
  /** 검색어 또는 장소명 (출력 디렉토리명에도 사용) */
  placeName: z.string().min(2),
  /** 장소 페이지 URL (지정 시 검색 대신 직접 이동) */
  pageUrl: z.string().min(10).optional(),
  sortBy: SortBySchema.default("most_recent"),
  /** 수집할 최대 리뷰 수 (-1 또는 0: 전체) */
  maxReviews: z.number().int().min(-1).default(-1),
  stopCriteria: StopCriterionSchema.optional(),
  saveReviews: z.boolean().default(true),
  saveMetadata: z.boolean().default(true),
});

export type ScrapeInput = z.infer<typeof ScrapeInputSchema>;
export type ScrapeInputParams = z.input<typeof ScrapeInputSchema>;

/**
 * 최대 리뷰 수를 루프 cap으로 변환 (제한 없음: undefined)
 */
export function toMaxCount(maxReviews: number): number | undefined {
  return maxReviews > 0 ? maxReviews : undefined;
}
