/**
 * Config Merger Utility
 *
 * SOLID 원칙:
 * - SRP: 실행 입력 검증 + 설정 파일 값 병합만 담당
 *
 * 용도:
 * - CLI / 모듈 API 입력을 ScrapeInput으로 검증
 * - 입력에 중단 조건이 없으면 config.yml의 stop_criteria 사용
 */

import { formatZodIssues } from "@/config/ConfigLoader";
import type { AppConfig } from "@/core/domain/AppConfig";
import {
  ScrapeInput,
  ScrapeInputParams,
  ScrapeInputSchema,
} from "@/core/domain/ScrapeInput";
import { buildStopCriterion } from "@/core/domain/StopCriterion";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";

/**
 * 입력 검증 + 중단 조건 병합 (입력값 우선)
 *
 * @example
 * const config = { stop_criteria: { username: "Jane D" }, ... };
 * resolveScrapeInput({ placeName: "Harbor View Hotel" }, config);
 * // { placeName: "Harbor View Hotel", sortBy: "most_recent", maxReviews: -1,
 * //   stopCriteria: { username: "Jane D" }, saveReviews: true, saveMetadata: true }
 */
export function resolveScrapeInput(
  params: ScrapeInputParams,
  config: Pick<AppConfig, "stop_criteria">,
): ScrapeInput {
  const parsed = ScrapeInputSchema.safeParse(params);
  if (!parsed.success) {
    throw new ScrapeError(
      ScrapeErrorType.INPUT_INVALID,
      `Invalid input: ${formatZodIssues(parsed.error)}`,
    );
  }

  return {
    ...parsed.data,
    stopCriteria:
      parsed.data.stopCriteria ??
      buildStopCriterion(
        config.stop_criteria?.username,
        config.stop_criteria?.review_text,
      ),
  };
}
