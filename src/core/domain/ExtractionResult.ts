/**
 * 증분 추출 루프 결과
 */

import type { ReviewRecord } from "@/core/domain/ReviewRecord";

/**
 * 종료 사유 (모두 정상 종료)
 * - stop_criterion: 중단 조건 리뷰 발견 (해당 리뷰 포함)
 * - max_count: 최대 개수 도달
 * - exhausted: 스크롤해도 새 리뷰 없음
 */
export type StopReason = "stop_criterion" | "max_count" | "exhausted";

export interface ExtractionResult {
  records: ReviewRecord[];
  reason: StopReason;
  /** 루프 반복 횟수 */
  iterations: number;
  /** 중복으로 버린 레코드 수 */
  duplicates: number;
  /** 파싱 실패/누락으로 건너뛴 요소 수 */
  skipped: number;
}
